import type { Stats } from './stats'

export type Side = 'first' | 'second'

export type TurnState = 'unset' | 'waiting-on-first' | 'waiting-on-second'

export interface RosterEmpty {
  kind: 'roster-empty'
  owner: string
}

export interface TimedModifier {
  modifier: Stats
  rounds: number
}

export interface FleeAction {
  readonly kind: 'flee'
}

export interface SwitchAction {
  readonly kind: 'switch'
  readonly index: number
}

interface ItemBase {
  readonly kind: 'item'
  readonly name: string
}

export interface CaptureItem extends ItemBase {
  readonly effect: 'capture'
  readonly catchChance: number
}

export interface RestoreItem extends ItemBase {
  readonly effect: 'restore'
  readonly healthRestored: number
}

export type Item = CaptureItem | RestoreItem

interface MoveBase {
  readonly kind: 'move'
  readonly name: string
  readonly element: string
  readonly maxUses: number
  /** Lower values resolve sooner. */
  readonly speed: number
}

export interface AttackMove extends MoveBase {
  readonly effect: 'attack'
  readonly baseDamage: number
  readonly hitChance: number
}

export interface BuffMove extends MoveBase {
  readonly effect: 'buff'
  readonly modifier: Stats
  readonly rounds: number
}

export interface DebuffMove extends MoveBase {
  readonly effect: 'debuff'
  readonly modifier: Stats
  readonly rounds: number
}

export type Move = AttackMove | BuffMove | DebuffMove

export type Action = FleeAction | SwitchAction | Item | Move

export interface MoveInfo {
  move: Move
  uses: number
}
