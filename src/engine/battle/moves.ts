import type { Battle, BattleView } from './battle'
import { EffectLog } from './log'
import { calculateDamage, canAct, hitChance, opposite } from './rules'
import type { Stats } from './stats'
import type { AttackMove, BuffMove, DebuffMove, Move, Side } from './types'

interface MoveParams {
  name: string
  element: string
  maxUses: number
  speed: number
}

export function attackMove(params: MoveParams & { baseDamage: number; hitChance: number }): AttackMove {
  return Object.freeze({ kind: 'move', effect: 'attack', ...params })
}

export function buffMove(params: MoveParams & { modifier: Stats; rounds: number }): BuffMove {
  return Object.freeze({ kind: 'move', effect: 'buff', ...params })
}

export function debuffMove(params: MoveParams & { modifier: Stats; rounds: number }): DebuffMove {
  return Object.freeze({ kind: 'move', effect: 'debuff', ...params })
}

export function isMoveValid(move: Move, battle: BattleView, side: Side): boolean {
  return canAct(battle, side) && battle.active(side).remainingUses(move) > 0
}

/**
 * Narrative order is fixed: the "used" line, then effects on the user's
 * side, then effects on the opponent.
 */
export function applyMove(move: Move, battle: Battle, side: Side): EffectLog {
  const user = battle.active(side)
  const result = new EffectLog(`${user.name} used ${move.name}.`)

  result.combine(allyEffects(move, battle, side))
  result.combine(enemyEffects(move, battle, side))

  battle.active(side).reduceUses(move)
  return result
}

function allyEffects(move: Move, battle: Battle, side: Side): EffectLog {
  if (move.effect !== 'buff') {
    return new EffectLog()
  }
  const combatant = battle.active(side)
  combatant.addTimedModifier(move.modifier, move.rounds)
  return new EffectLog(`${combatant.name} was buffed for ${move.rounds} turns.`)
}

function enemyEffects(move: Move, battle: Battle, side: Side): EffectLog {
  switch (move.effect) {
    case 'attack':
      return strike(move, battle, side)
    case 'debuff': {
      const target = battle.active(opposite(side))
      target.addTimedModifier(move.modifier, move.rounds)
      return new EffectLog(`${target.name} was debuffed for ${move.rounds} turns.`)
    }
    case 'buff':
      return new EffectLog()
    default: {
      const unreachable: never = move
      return unreachable
    }
  }
}

function strike(move: AttackMove, battle: Battle, side: Side): EffectLog {
  const attacker = battle.active(side)
  const defender = battle.active(opposite(side))

  if (!battle.chance.holds(hitChance(attacker, move))) {
    return new EffectLog(`${attacker.name} missed!`)
  }

  const result = new EffectLog()
  defender.adjustHealth(-calculateDamage(move, attacker, defender, battle.elements))

  if (defender.hasFainted()) {
    const reward = defender.experienceReward()
    attacker.grantExperience(reward)
    result.add(`${defender.name} has fainted.`)
    result.add(`${attacker.name} gained ${reward} exp.`)
  }
  return result
}
