import logger from '@utils/logger'

import { applyAction, describeAction, isValid, priorityOf } from './actions'
import { randomChance, type ChanceSource } from './chance'
import type { Combatant, CombatantView } from './combatant'
import type { ElementChartView } from './elements'
import { RosterEmptyError } from './errors'
import type { EffectLog } from './log'
import { Party, type PartyView } from './party'
import { opposite, waitingOn } from './rules'
import type { Action, RosterEmpty, Side, TurnState } from './types'

export interface BattleOptions {
  duel: boolean
  elements: ElementChartView
  chance?: ChanceSource
}

export type BattleSetup =
  | { ok: true; battle: Battle }
  | { ok: false; error: RosterEmpty; side: Side }

/** Read-only surface handed to decision policies and presentation layers. */
export interface BattleView {
  readonly elements: ElementChartView
  isDuel(): boolean
  hasEndedEarly(): boolean
  turnState(): TurnState
  isQueueEmpty(): boolean
  isQueueFull(): boolean
  hasQueued(side: Side): boolean
  isReady(): boolean
  isOver(): boolean
  party(side: Side): PartyView
  active(side: Side): CombatantView
}

interface QueuedAction {
  action: Action
  side: Side
}

const QUEUE_CAPACITY = 2

export class Battle implements BattleView {
  readonly elements: ElementChartView

  readonly chance: ChanceSource

  private readonly parties: Record<Side, Party>

  private readonly duel: boolean

  private endedEarly = false

  private turn: TurnState = 'unset'

  private queue: QueuedAction[] = []

  /** Both parties must already have an active combatant. */
  static create(first: Party, second: Party, options: BattleOptions): BattleSetup {
    for (const [side, party] of [['first', first], ['second', second]] as const) {
      const lookup = party.activeCombatant()
      if (!lookup.ok) {
        return { ok: false, error: lookup.error, side }
      }
    }
    return { ok: true, battle: new Battle(first, second, options) }
  }

  private constructor(first: Party, second: Party, options: BattleOptions) {
    this.parties = { first, second }
    this.duel = options.duel
    this.elements = options.elements
    this.chance = options.chance ?? randomChance()
  }

  isDuel(): boolean {
    return this.duel
  }

  hasEndedEarly(): boolean {
    return this.endedEarly
  }

  turnState(): TurnState {
    return this.turn
  }

  party(side: Side): Party {
    return this.parties[side]
  }

  active(side: Side): Combatant {
    const lookup = this.parties[side].activeCombatant()
    if (!lookup.ok) {
      throw new RosterEmptyError(lookup.error.owner)
    }
    return lookup.combatant
  }

  isQueueEmpty(): boolean {
    return this.queue.length === 0
  }

  isQueueFull(): boolean {
    return this.queue.length === QUEUE_CAPACITY
  }

  hasQueued(side: Side): boolean {
    return this.queue.some((entry) => entry.side === side)
  }

  isReady(): boolean {
    switch (this.turn) {
      case 'unset':
        return this.isQueueFull()
      case 'waiting-on-first':
        return this.hasQueued('first')
      case 'waiting-on-second':
        return this.hasQueued('second')
      default: {
        const unreachable: never = this.turn
        return unreachable
      }
    }
  }

  isOver(): boolean {
    return this.endedEarly || this.parties.first.allFainted() || this.parties.second.allFainted()
  }

  /** Duels ignore the request; everything else ends for good. */
  attemptEndEarly(): void {
    if (!this.duel) {
      this.endedEarly = true
    }
  }

  /** Returns whether the action was accepted; rejection leaves the battle untouched. */
  queueAction(action: Action, side: Side): boolean {
    if (this.hasQueued(side) || this.isReady() || !isValid(action, this, side)) {
      logger.debug('battle_action_rejected', { side, action: describeAction(action), turn: this.turn })
      return false
    }
    this.queue.push({ action, side })
    return true
  }

  resolveNext(): EffectLog | undefined {
    if (this.isQueueFull()) {
      this.queue.sort((a, b) => priorityOf(a.action) - priorityOf(b.action))
    }

    const next = this.queue.shift()
    if (!next) {
      return undefined
    }

    // State may have moved on since the action was queued.
    if (!isValid(next.action, this, next.side)) {
      logger.debug('battle_stale_action_discarded', { side: next.side, action: describeAction(next.action) })
      return undefined
    }

    const result = applyAction(next.action, this, next.side)
    this.advanceTurn(next.side)
    return result
  }

  private advanceTurn(actor: Side) {
    if (this.turn === 'unset') {
      this.turn = waitingOn(opposite(actor))
      return
    }
    this.turn = 'unset'
    this.active('first').tickModifiers()
    this.active('second').tickModifiers()
  }
}

/** A non-duel battle against an anonymous party holding only the wild combatant. */
export function createEncounter(
  party: Party,
  wild: Combatant,
  options: Omit<BattleOptions, 'duel'>,
): BattleSetup {
  const wilderness = new Party('')
  wilderness.add(wild)
  return Battle.create(party, wilderness, { ...options, duel: false })
}
