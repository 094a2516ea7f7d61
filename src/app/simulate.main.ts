import { load } from '@config/store'
import { buildContent } from '@content/adapters'
import { antagonistPolicy, defaultPolicy } from '@engine/ai/policies'
import { Battle, createEncounter, type BattleSetup } from '@engine/battle/battle'
import { randomChance, seededChance } from '@engine/battle/chance'
import logger from '@utils/logger'

import { runBattle } from './simulate'

async function main() {
  const cfg = await load()
  const content = buildContent(cfg)

  const firstId = process.env.BATTLE_FIRST || 'player'
  const secondId = process.env.BATTLE_SECOND || 'rival'
  const wildId = process.env.BATTLE_WILD
  const seed = Number.parseInt(process.env.BATTLE_SEED ?? '', 10)
  const chance = Number.isFinite(seed) ? seededChance(seed) : randomChance()

  const first = content.party(firstId)
  if (!first) {
    throw new Error(`Unknown party ${firstId}.`)
  }

  let setup: BattleSetup
  if (wildId) {
    const wild = content.wild(wildId)
    if (!wild) {
      throw new Error(`Unknown wild combatant ${wildId}.`)
    }
    setup = createEncounter(first, wild, { elements: content.elements, chance })
  } else {
    const second = content.party(secondId)
    if (!second) {
      throw new Error(`Unknown party ${secondId}.`)
    }
    setup = Battle.create(first, second, { duel: true, elements: content.elements, chance })
  }

  if (!setup.ok) {
    throw new Error(`The ${setup.side} party (${setup.error.owner || 'wild'}) has no combatants.`)
  }

  const transcript = runBattle(setup.battle, {
    first: defaultPolicy,
    second: antagonistPolicy({ target: content.antagonistTarget }),
  })

  for (const message of transcript.messages) {
    console.log(message)
  }
  console.log(`Outcome: ${transcript.outcome} after ${transcript.rounds} round(s).`)
}

main().catch((error: unknown) => {
  logger.error('simulation_failed', { message: error instanceof Error ? error.message : String(error) })
  process.exitCode = 1
})
