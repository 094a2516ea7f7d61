import type { DecisionPolicy } from '@engine/ai/policies'
import type { Battle } from '@engine/battle/battle'
import type { Side } from '@engine/battle/types'
import logger from '@utils/logger'

export type BattleOutcome = 'first-won' | 'second-won' | 'ended-early' | 'stalled'

export interface BattleTranscript {
  outcome: BattleOutcome
  rounds: number
  resolutions: number
  messages: string[]
}

export interface RunOptions {
  /** Upper bound on resolved or discarded actions; duels where nobody can win stop here. */
  maxResolutions?: number
}

function sidesToPrompt(battle: Battle): Side[] {
  switch (battle.turnState()) {
    case 'unset':
      return ['first', 'second']
    case 'waiting-on-first':
      return ['first']
    case 'waiting-on-second':
      return ['second']
  }
}

function outcomeOf(battle: Battle): BattleOutcome {
  if (battle.party('second').allFainted()) return 'first-won'
  if (battle.party('first').allFainted()) return 'second-won'
  return 'ended-early'
}

/**
 * Plays a battle to completion with a policy on each side. Whichever sides
 * may submit are prompted, then the queue is resolved one action at a time.
 */
export function runBattle(
  battle: Battle,
  policies: Record<Side, DecisionPolicy>,
  options: RunOptions = {},
): BattleTranscript {
  const maxResolutions = options.maxResolutions ?? 500
  const messages: string[] = []
  let rounds = 0
  let resolutions = 0
  let outcome: BattleOutcome | undefined

  while (!battle.isOver()) {
    if (resolutions >= maxResolutions) {
      outcome = 'stalled'
      break
    }

    for (const side of sidesToPrompt(battle)) {
      if (!battle.hasQueued(side)) {
        battle.queueAction(policies[side].nextAction(battle, side), side)
      }
    }

    if (!battle.isReady()) {
      logger.warn('simulation_policy_rejected', { turn: battle.turnState() })
      outcome = 'stalled'
      break
    }

    const wasWaiting = battle.turnState() !== 'unset'
    const log = battle.resolveNext()
    resolutions += 1
    if (log) {
      messages.push(...log.messages())
      if (wasWaiting && battle.turnState() === 'unset') {
        rounds += 1
      }
    }
  }

  const result: BattleTranscript = {
    outcome: outcome ?? outcomeOf(battle),
    rounds,
    resolutions,
    messages,
  }
  logger.info('simulation_finished', {
    outcome: result.outcome,
    rounds: result.rounds,
    first: policies.first.name,
    second: policies.second.name,
  })
  return result
}
