import { describe, expect, it } from 'vitest'

import { FLEE_IN_DUEL, flee } from '@engine/battle/actions'
import { fixedChance, seededChance } from '@engine/battle/chance'
import { ElementChart } from '@engine/battle/elements'
import { EffectLog } from '@engine/battle/log'
import { attackMove } from '@engine/battle/moves'
import { calculateDamage, hitChance } from '@engine/battle/rules'

import { makeBattle, makeCombatant, makeParty, makeTackle } from './helpers/fixtures'

describe('damage rules', () => {
  it('scales damage by effectiveness, attack and defense', () => {
    const scorch = attackMove({ name: 'Scorch', element: 'fire', maxUses: 10, speed: 100, baseDamage: 40, hitChance: 1 })
    const attacker = makeCombatant('Cindersnout', [1, 100, 110, 100], [scorch], { element: 'fire' })
    const defender = makeCombatant('Sproutle', [1, 100, 100, 120], [], { element: 'grass' })
    const chart = new ElementChart().register('fire', 'grass', 2)

    expect(calculateDamage(scorch, attacker, defender, chart)).toBe(72)
    expect(calculateDamage(scorch, attacker, defender, new ElementChart())).toBe(36)
  })

  it('multiplies hit chances', () => {
    const attacker = makeCombatant('Alpha', [0.5, 100, 100, 100])
    expect(hitChance(attacker, makeTackle())).toBe(0.475)
  })
})

describe('attack moves', () => {
  it('hits for the computed damage', () => {
    const tackle = makeTackle()
    const alpha = makeCombatant('Alpha', [1, 100, 110, 120], [tackle])
    const beta = makeCombatant('Beta', [1, 100, 110, 120])
    const battle = makeBattle(makeParty('Rowan', alpha), makeParty('Slate', beta), { chance: fixedChance(true) })

    battle.queueAction(tackle, 'first')
    battle.queueAction(flee(), 'second')

    expect(battle.resolveNext()?.messages()).toEqual([FLEE_IN_DUEL])
    expect(battle.resolveNext()?.messages()).toEqual(['Alpha used Tackle.'])
    expect(beta.health()).toBe(64)
    expect(alpha.remainingUses(tackle)).toBe(14)
  })

  it('misses when the roll fails and still spends a use', () => {
    const tackle = makeTackle()
    const alpha = makeCombatant('Alpha', [1, 100, 110, 120], [tackle])
    const beta = makeCombatant('Beta')
    const battle = makeBattle(makeParty('Rowan', alpha), makeParty('Slate', beta), { chance: fixedChance(false) })

    battle.queueAction(tackle, 'first')
    battle.queueAction(flee(), 'second')

    expect(battle.resolveNext()?.messages()).toEqual([FLEE_IN_DUEL])
    expect(battle.resolveNext()?.messages()).toEqual(['Alpha used Tackle.', 'Alpha missed!'])
    expect(beta.health()).toBe(100)
    expect(alpha.remainingUses(tackle)).toBe(14)
  })

  it('ends the battle when the last opposing combatant faints', () => {
    const crush = attackMove({ name: 'Crush', element: 'normal', maxUses: 5, speed: 10, baseDamage: 200, hitChance: 1 })
    const alpha = makeCombatant('Alpha', [1, 100, 110, 120], [crush], { level: 5 })
    const beta = makeCombatant('Beta', [1, 30, 110, 120], [], { level: 5 })
    const battle = makeBattle(makeParty('Rowan', alpha), makeParty('Slate', beta))

    battle.queueAction(crush, 'first')
    battle.queueAction(flee(), 'second')

    expect(battle.resolveNext()?.messages()).toEqual([FLEE_IN_DUEL])
    expect(battle.resolveNext()?.messages()).toEqual(['Alpha used Crush.', 'Beta has fainted.', 'Alpha gained 142 exp.'])
    expect(alpha.experience()).toBe(267)
    expect(alpha.level()).toBe(6)
    expect(battle.isOver()).toBe(true)
    expect(battle.resolveNext()).toBeUndefined()
  })
})

describe('chance sources', () => {
  it('replays the same rolls for the same seed', () => {
    const a = seededChance(42)
    const b = seededChance(42)
    const rollsA = Array.from({ length: 20 }, () => a.holds(0.5))
    const rollsB = Array.from({ length: 20 }, () => b.holds(0.5))
    expect(rollsA).toEqual(rollsB)
  })

  it('treats probabilities of zero and one as certain', () => {
    const chance = seededChance(7)
    for (let i = 0; i < 50; i += 1) {
      expect(chance.holds(1)).toBe(true)
      expect(chance.holds(0)).toBe(false)
    }
  })
})

describe('element chart', () => {
  it('defaults unlisted pairs to neutral', () => {
    const chart = new ElementChart().register('water', 'fire', 2).register('fire', 'water', 0.5)
    expect(chart.effectiveness('water', 'fire')).toBe(2)
    expect(chart.effectiveness('fire', 'water')).toBe(0.5)
    expect(chart.effectiveness('grass', 'rock')).toBe(1)
    expect(chart.elements()).toEqual(['water', 'fire'])
  })

  it('rejects non-positive multipliers', () => {
    expect(() => new ElementChart().register('fire', 'fire', 0)).toThrow(RangeError)
  })
})

describe('effect log', () => {
  it('appends messages in order', () => {
    const log = new EffectLog('one').combine(new EffectLog('two').add('three'))
    expect(log.messages()).toEqual(['one', 'two', 'three'])
    expect(new EffectLog().isEmpty()).toBe(true)
  })
})
