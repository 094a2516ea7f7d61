import type { Combatant, CombatantView } from './combatant'
import { rosterEmpty } from './errors'
import type { Item, RosterEmpty } from './types'

export const MAX_ROSTER = 6

export type ActiveLookup<C extends CombatantView = CombatantView> =
  | { ok: true; combatant: C }
  | { ok: false; error: RosterEmpty }

export interface PartyView {
  readonly name: string
  activeCombatant(): ActiveLookup
  activeIndex(): number | undefined
  rosterSnapshot(): CombatantView[]
  inventory(): Map<Item, number>
  hasItem(item: Item): boolean
  itemCount(item: Item): number
  canAdd(combatant: Combatant): boolean
  canSwitchTo(index: number): boolean
  allFainted(): boolean
}

/** An owner's roster, its active pointer and its consumable inventory. */
export class Party implements PartyView {
  readonly name: string

  private readonly roster: Combatant[] = []

  private active: number | undefined

  private readonly items = new Map<Item, number>()

  constructor(name: string) {
    this.name = name
  }

  activeCombatant(): ActiveLookup<Combatant> {
    if (this.active === undefined) {
      return { ok: false, error: rosterEmpty(this.name) }
    }
    return { ok: true, combatant: this.roster[this.active] }
  }

  activeIndex(): number | undefined {
    return this.active
  }

  rosterSnapshot(): Combatant[] {
    return this.roster.slice()
  }

  canAdd(combatant: Combatant): boolean {
    return !this.roster.includes(combatant) && this.roster.length < MAX_ROSTER
  }

  add(combatant: Combatant): void {
    this.roster.push(combatant)
    if (this.active === undefined) {
      this.active = 0
    }
  }

  canSwitchTo(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.roster.length) {
      return false
    }
    if (index === this.active) {
      return false
    }
    return !this.roster[index].hasFainted()
  }

  switchTo(index: number): void {
    this.active = index
  }

  inventory(): Map<Item, number> {
    return new Map(this.items)
  }

  addItem(item: Item, count: number): void {
    const qty = Math.floor(count)
    if (qty <= 0) {
      return
    }
    this.items.set(item, (this.items.get(item) ?? 0) + qty)
  }

  hasItem(item: Item): boolean {
    return this.items.has(item)
  }

  itemCount(item: Item): number {
    return this.items.get(item) ?? 0
  }

  consumeItem(item: Item): void {
    const qty = this.items.get(item)
    if (qty === undefined) {
      return
    }
    if (qty <= 1) {
      this.items.delete(item)
    } else {
      this.items.set(item, qty - 1)
    }
  }

  allFainted(): boolean {
    return this.roster.every((combatant) => combatant.hasFainted())
  }

  restAll(): void {
    for (const combatant of this.roster) {
      combatant.rest()
    }
  }
}
