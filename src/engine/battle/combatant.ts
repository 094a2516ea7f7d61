import { applyModifier, levelUpStats, type Stats } from './stats'
import type { Move, MoveInfo, TimedModifier } from './types'

export const MAX_MOVE_SLOTS = 4

export interface CombatantOptions {
  name: string
  element: string
  stats: Stats
  moves?: Move[]
  level?: number
}

export interface CombatantView {
  readonly name: string
  readonly element: string
  level(): number
  experience(): number
  nextLevelExperience(): number
  experienceReward(): number
  health(): number
  baseStats(): Stats
  effectiveStats(): Stats
  activeModifiers(): TimedModifier[]
  hasFainted(): boolean
  knows(move: Move): boolean
  remainingUses(move: Move): number
  moveInfo(): MoveInfo[]
  hasUsableMove(): boolean
  canLearn(move: Move): boolean
  describe(): string
}

export function levelForExperience(experience: number): number {
  if (experience <= 0) {
    return 0
  }
  let root = Math.round(Math.cbrt(experience))
  while (root ** 3 > experience) root -= 1
  while ((root + 1) ** 3 <= experience) root += 1
  return root
}

export class Combatant implements CombatantView {
  readonly name: string

  readonly element: string

  private stats: Stats

  private modifiers: TimedModifier[] = []

  private currentHealth: number

  private currentLevel: number

  private xp: number

  // insertion ordered, keyed by move identity
  private readonly moves = new Map<Move, number>()

  constructor(options: CombatantOptions) {
    this.name = options.name
    this.element = options.element
    this.stats = options.stats
    this.currentHealth = options.stats.maxHealth
    this.currentLevel = Math.max(1, Math.floor(options.level ?? 1))
    this.xp = this.currentLevel ** 3

    for (const move of options.moves ?? []) {
      if (this.canLearn(move)) {
        this.learn(move)
      }
    }
  }

  level(): number {
    return this.currentLevel
  }

  experience(): number {
    return this.xp
  }

  nextLevelExperience(): number {
    return (this.currentLevel + 1) ** 3
  }

  experienceReward(): number {
    return Math.floor((200 * this.currentLevel) / 7)
  }

  health(): number {
    return this.currentHealth
  }

  baseStats(): Stats {
    return this.stats
  }

  effectiveStats(): Stats {
    let result = this.stats
    for (const { modifier } of this.modifiers) {
      result = applyModifier(result, modifier)
    }
    return result
  }

  activeModifiers(): TimedModifier[] {
    return this.modifiers.map((entry) => ({ ...entry }))
  }

  hasFainted(): boolean {
    return this.currentHealth === 0
  }

  adjustHealth(delta: number): void {
    const max = this.effectiveStats().maxHealth
    this.currentHealth = Math.max(0, Math.min(this.currentHealth + delta, max))
  }

  grantExperience(amount: number): void {
    this.xp += Math.max(0, Math.floor(amount))
    const target = levelForExperience(this.xp)
    for (let level = this.currentLevel; level < target; level += 1) {
      this.levelUp()
    }
  }

  levelUp(): void {
    const before = this.effectiveStats().maxHealth
    this.currentLevel += 1
    this.stats = levelUpStats(this.stats)
    this.adjustHealth(this.effectiveStats().maxHealth - before)
  }

  knows(move: Move): boolean {
    return this.moves.has(move)
  }

  remainingUses(move: Move): number {
    return this.moves.get(move) ?? 0
  }

  moveInfo(): MoveInfo[] {
    return Array.from(this.moves, ([move, uses]) => ({ move, uses })).sort((a, b) =>
      a.move.name < b.move.name ? -1 : a.move.name > b.move.name ? 1 : 0,
    )
  }

  hasUsableMove(): boolean {
    for (const uses of this.moves.values()) {
      if (uses > 0) return true
    }
    return false
  }

  canLearn(move: Move): boolean {
    return this.moves.size < MAX_MOVE_SLOTS && !this.moves.has(move)
  }

  learn(move: Move): void {
    this.moves.set(move, move.maxUses)
  }

  forget(move: Move): void {
    this.moves.delete(move)
  }

  reduceUses(move: Move): void {
    const uses = this.moves.get(move)
    if (uses !== undefined) {
      this.moves.set(move, Math.max(0, uses - 1))
    }
  }

  addTimedModifier(modifier: Stats, rounds: number): void {
    this.modifiers.push({ modifier, rounds })
    this.adjustHealth(0)
  }

  /** Round-boundary upkeep: counts every modifier down and drops the expired ones. */
  tickModifiers(): void {
    this.modifiers = this.modifiers
      .filter((entry) => entry.rounds > 1)
      .map((entry) => ({ modifier: entry.modifier, rounds: entry.rounds - 1 }))
    this.adjustHealth(0)
  }

  rest(): void {
    this.modifiers = []
    this.currentHealth = this.stats.maxHealth
    for (const move of this.moves.keys()) {
      this.moves.set(move, move.maxUses)
    }
  }

  describe(): string {
    return `${this.name} (lv${this.currentLevel})`
  }
}
