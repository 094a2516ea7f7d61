import type { Battle, BattleView } from './battle'
import { EffectLog } from './log'
import { canAct, opposite } from './rules'
import type { CaptureItem, Item, RestoreItem, Side } from './types'

export const CAPTURE_IN_DUEL = 'Capture items have no effect in trainer battles.'

export function captureItem(name: string, catchChance: number): CaptureItem {
  return Object.freeze({ kind: 'item', effect: 'capture', name, catchChance })
}

export function restoreItem(name: string, healthRestored: number): RestoreItem {
  return Object.freeze({ kind: 'item', effect: 'restore', name, healthRestored })
}

export function isItemValid(item: Item, battle: BattleView, side: Side): boolean {
  return canAct(battle, side) && battle.party(side).hasItem(item)
}

export function applyItem(item: Item, battle: Battle, side: Side): EffectLog {
  switch (item.effect) {
    case 'capture':
      return applyCapture(item, battle, side)
    case 'restore':
      return applyRestore(item, battle, side)
    default: {
      const unreachable: never = item
      return unreachable
    }
  }
}

function applyCapture(item: CaptureItem, battle: Battle, side: Side): EffectLog {
  const party = battle.party(side)
  party.consumeItem(item)

  if (battle.isDuel()) {
    return new EffectLog(CAPTURE_IN_DUEL)
  }

  const target = battle.active(opposite(side))
  if (!battle.chance.holds(item.catchChance)) {
    return new EffectLog(`It was so close, but ${target.name} escaped!`)
  }

  let result: EffectLog
  if (party.canAdd(target)) {
    party.add(target)
    result = new EffectLog(`${target.name} was caught!`)
  } else {
    result = new EffectLog(`${target.name} was caught, but there was no more room.`)
  }
  battle.attemptEndEarly()
  return result
}

function applyRestore(item: RestoreItem, battle: Battle, side: Side): EffectLog {
  const party = battle.party(side)
  const combatant = battle.active(side)
  combatant.adjustHealth(item.healthRestored)
  party.consumeItem(item)
  return new EffectLog(`${combatant.name} ate ${item.name}.`)
}
