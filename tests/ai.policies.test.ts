import { describe, expect, it } from 'vitest'

import { flee } from '@engine/battle/actions'
import { ElementChart } from '@engine/battle/elements'
import { captureItem, restoreItem } from '@engine/battle/items'
import { attackMove } from '@engine/battle/moves'
import { antagonistPolicy, defaultPolicy, fleeingPolicy } from '@engine/ai/policies'

import { makeBattle, makeCombatant, makeEncounter, makeParty, makeTackle } from './helpers/fixtures'

const aquaJet = attackMove({ name: 'Aqua Jet', element: 'water', maxUses: 12, speed: 90, baseDamage: 40, hitChance: 0.9 })
const scorch = attackMove({ name: 'Scorch', element: 'fire', maxUses: 15, speed: 100, baseDamage: 40, hitChance: 0.8 })

describe('default policy', () => {
  it('replaces a fainted combatant with the first one standing', () => {
    const alpha = makeCombatant('Alpha')
    const battle = makeBattle(makeParty('Rowan', alpha, makeCombatant('Delta')), makeParty('Slate', makeCombatant('Beta')))
    alpha.adjustHealth(-1000)

    const action = defaultPolicy.nextAction(battle, 'first')

    expect(action).toEqual({ kind: 'switch', index: 1 })
    expect(battle.queueAction(action, 'first')).toBe(true)
  })

  it('picks the first move by name that still has uses', () => {
    const tackle = makeTackle()
    const alpha = makeCombatant('Alpha', undefined, [tackle, aquaJet])
    const battle = makeBattle(makeParty('Rowan', alpha), makeParty('Slate', makeCombatant('Beta')))

    expect(defaultPolicy.nextAction(battle, 'first')).toBe(aquaJet)

    for (let i = 0; i < aquaJet.maxUses; i += 1) alpha.reduceUses(aquaJet)
    expect(defaultPolicy.nextAction(battle, 'first')).toBe(tackle)

    for (let i = 0; i < tackle.maxUses; i += 1) alpha.reduceUses(tackle)
    expect(defaultPolicy.nextAction(battle, 'first')).toBe(flee())
  })
})

describe('fleeing policy', () => {
  it('always runs unless it has to switch', () => {
    const alpha = makeCombatant('Alpha', undefined, [makeTackle()])
    const battle = makeBattle(makeParty('Rowan', alpha, makeCombatant('Delta')), makeParty('Slate', makeCombatant('Beta')))

    expect(fleeingPolicy.nextAction(battle, 'first')).toBe(flee())
    alpha.adjustHealth(-1000)
    expect(fleeingPolicy.nextAction(battle, 'first')).toEqual({ kind: 'switch', index: 1 })
  })
})

describe('antagonist policy', () => {
  const policy = antagonistPolicy({ target: 'Voltmouse' })

  it('runs from wild encounters', () => {
    const battle = makeEncounter(makeParty('Slate', makeCombatant('Beta', undefined, [scorch])), makeCombatant('Whiskrat'))
    expect(policy.nextAction(battle, 'first')).toBe(flee())
  })

  it('throws the first capture item at its target', () => {
    const stew = restoreItem('Hearty Stew', 69)
    const great = captureItem('Great Ball', 0.6)
    const master = captureItem('Master Ball', 1)
    const slate = makeParty('Slate', makeCombatant('Beta', undefined, [scorch]))
    slate.addItem(stew, 1)
    slate.addItem(great, 1)
    slate.addItem(master, 1)
    const battle = makeBattle(makeParty('Rowan', makeCombatant('VOLTMOUSE')), slate)

    const action = policy.nextAction(battle, 'second')

    expect(action).toBe(great)
    expect(battle.queueAction(action, 'second')).toBe(true)
  })

  it('prefers super effective moves over name order', () => {
    const chart = new ElementChart().register('fire', 'grass', 2).register('water', 'grass', 0.5)
    const battle = makeBattle(
      makeParty('Rowan', makeCombatant('Sproutle', undefined, [], { element: 'grass' })),
      makeParty('Slate', makeCombatant('Beta', undefined, [aquaJet, scorch])),
      { elements: chart },
    )

    expect(policy.nextAction(battle, 'second')).toBe(scorch)
  })

  it('falls back to the first usable move, then to fleeing', () => {
    const beta = makeCombatant('Beta', undefined, [scorch, aquaJet])
    const battle = makeBattle(makeParty('Rowan', makeCombatant('Fluffin')), makeParty('Slate', beta))

    expect(policy.nextAction(battle, 'second')).toBe(aquaJet)

    beta.forget(aquaJet)
    beta.forget(scorch)
    expect(policy.nextAction(battle, 'second')).toBe(flee())
  })

  it('switches before anything else when its combatant has fainted', () => {
    const beta = makeCombatant('Beta', undefined, [scorch])
    const battle = makeBattle(makeParty('Rowan', makeCombatant('Voltmouse')), makeParty('Slate', beta, makeCombatant('Gamma')))
    beta.adjustHealth(-1000)

    expect(policy.nextAction(battle, 'second')).toEqual({ kind: 'switch', index: 1 })
  })
})
