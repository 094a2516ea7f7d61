import type { Battle, BattleView } from './battle'
import { applyItem, isItemValid } from './items'
import { EffectLog } from './log'
import { applyMove, isMoveValid } from './moves'
import { DEFAULT_ACTION_PRIORITY, SPEED_BASED_ACTION_PRIORITY, baseValid, canAct } from './rules'
import type { Action, FleeAction, Side, SwitchAction } from './types'

export const FLEE_SUCCESS = 'Got away safely!'
export const FLEE_IN_DUEL = 'Unable to escape a trainer battle.'

const FLEE: FleeAction = Object.freeze({ kind: 'flee' })

export function flee(): FleeAction {
  return FLEE
}

export function switchTo(index: number): SwitchAction {
  return Object.freeze({ kind: 'switch', index })
}

/** Lower values resolve first within a round. */
export function priorityOf(action: Action): number {
  switch (action.kind) {
    case 'move':
      return SPEED_BASED_ACTION_PRIORITY + action.speed
    case 'flee':
    case 'switch':
    case 'item':
      return DEFAULT_ACTION_PRIORITY
    default: {
      const unreachable: never = action
      return unreachable
    }
  }
}

export function isValid(action: Action, battle: BattleView, side: Side): boolean {
  switch (action.kind) {
    case 'flee':
      return canAct(battle, side)
    case 'switch':
      return baseValid(battle, side) && battle.party(side).canSwitchTo(action.index)
    case 'item':
      return isItemValid(action, battle, side)
    case 'move':
      return isMoveValid(action, battle, side)
    default: {
      const unreachable: never = action
      return unreachable
    }
  }
}

export function applyAction(action: Action, battle: Battle, side: Side): EffectLog {
  switch (action.kind) {
    case 'flee':
      return applyFlee(battle)
    case 'switch':
      return applySwitch(action, battle, side)
    case 'item':
      return applyItem(action, battle, side)
    case 'move':
      return applyMove(action, battle, side)
    default: {
      const unreachable: never = action
      return unreachable
    }
  }
}

export function describeAction(action: Action): string {
  switch (action.kind) {
    case 'flee':
      return 'Flee()'
    case 'switch':
      return `SwitchTo(${action.index})`
    case 'item':
      return `${action.effect === 'capture' ? 'Capture' : 'Restore'}('${action.name}')`
    case 'move': {
      const label = action.effect.charAt(0).toUpperCase() + action.effect.slice(1)
      return `${label}('${action.name}', '${action.element}', ${action.maxUses})`
    }
    default: {
      const unreachable: never = action
      return unreachable
    }
  }
}

function applyFlee(battle: Battle): EffectLog {
  battle.attemptEndEarly()
  return new EffectLog(battle.isDuel() ? FLEE_IN_DUEL : FLEE_SUCCESS)
}

function applySwitch(action: SwitchAction, battle: Battle, side: Side): EffectLog {
  const party = battle.party(side)
  const previous = battle.active(side)
  const next = party.rosterSnapshot()[action.index]
  party.switchTo(action.index)

  const result = new EffectLog()
  if (side === 'first' && !previous.hasFainted()) {
    result.add(`${previous.name}, return!`)
  }
  result.add(`${party.name} switched to ${next.name}.`)
  return result
}
