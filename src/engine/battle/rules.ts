import type { BattleView } from './battle'
import type { CombatantView } from './combatant'
import type { ElementChartView } from './elements'
import type { AttackMove, Side } from './types'

export const DEFAULT_ACTION_PRIORITY = 0
export const SPEED_BASED_ACTION_PRIORITY = 1

export function opposite(side: Side): Side {
  return side === 'first' ? 'second' : 'first'
}

/** Shared by every action: the battle is live and it is this side's turn. */
export function baseValid(battle: BattleView, side: Side): boolean {
  if (battle.isOver()) {
    return false
  }
  const turn = battle.turnState()
  return turn === 'unset' || turn === waitingOn(side)
}

export function waitingOn(side: Side): 'waiting-on-first' | 'waiting-on-second' {
  return side === 'first' ? 'waiting-on-first' : 'waiting-on-second'
}

export function canAct(battle: BattleView, side: Side): boolean {
  return baseValid(battle, side) && !battle.active(side).hasFainted()
}

export function hitChance(attacker: CombatantView, move: AttackMove): number {
  return attacker.effectiveStats().hitChance * move.hitChance
}

export function calculateDamage(
  move: AttackMove,
  attacker: CombatantView,
  defender: CombatantView,
  elements: ElementChartView,
): number {
  const effectiveness = elements.effectiveness(move.element, defender.element)
  const attack = attacker.effectiveStats().attack
  const defense = defender.effectiveStats().defense
  return Math.floor((move.baseDamage * effectiveness * attack) / (defense + 1))
}
