import { Battle, createEncounter, type BattleOptions } from '@engine/battle/battle'
import { fixedChance } from '@engine/battle/chance'
import { Combatant } from '@engine/battle/combatant'
import { ElementChart } from '@engine/battle/elements'
import { attackMove } from '@engine/battle/moves'
import { Party } from '@engine/battle/party'
import { createStats, type StatTuple } from '@engine/battle/stats'
import type { AttackMove, Move } from '@engine/battle/types'

export function makeTackle(): AttackMove {
  return attackMove({ name: 'Tackle', element: 'normal', maxUses: 15, speed: 100, baseDamage: 40, hitChance: 0.95 })
}

export function makeCombatant(
  name: string,
  stats: StatTuple = [1, 100, 110, 120],
  moves: Move[] = [],
  options: { element?: string; level?: number } = {},
): Combatant {
  return new Combatant({
    name,
    element: options.element ?? 'normal',
    stats: createStats(...stats),
    moves,
    level: options.level ?? 1,
  })
}

export function makeParty(name: string, ...members: Combatant[]): Party {
  const party = new Party(name)
  for (const member of members) {
    party.add(member)
  }
  return party
}

export function makeBattle(first: Party, second: Party, options: Partial<BattleOptions> = {}): Battle {
  const setup = Battle.create(first, second, {
    duel: options.duel ?? true,
    elements: options.elements ?? new ElementChart(),
    chance: options.chance ?? fixedChance(true),
  })
  if (!setup.ok) {
    throw new Error(`fixture battle could not start: ${setup.side} party is empty`)
  }
  return setup.battle
}

export function makeEncounter(party: Party, wild: Combatant, options: Partial<BattleOptions> = {}): Battle {
  const setup = createEncounter(party, wild, {
    elements: options.elements ?? new ElementChart(),
    chance: options.chance ?? fixedChance(true),
  })
  if (!setup.ok) {
    throw new Error('fixture encounter could not start')
  }
  return setup.battle
}
