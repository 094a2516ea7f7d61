import { flee, switchTo } from '@engine/battle/actions'
import type { BattleView } from '@engine/battle/battle'
import type { PartyView } from '@engine/battle/party'
import { opposite } from '@engine/battle/rules'
import type { Action, Side } from '@engine/battle/types'

/**
 * Chooses the next action for a side. Implementations only read the battle;
 * the caller queues whatever comes back.
 */
export interface DecisionPolicy {
  readonly name: string
  nextAction(battle: BattleView, side: Side): Action
}

function switchToFirstStanding(party: PartyView): Action {
  const index = party.rosterSnapshot().findIndex((combatant) => !combatant.hasFainted())
  return index >= 0 ? switchTo(index) : flee()
}

/** Replace a fainted combatant, otherwise use the first move with uses left, otherwise flee. */
export const defaultPolicy: DecisionPolicy = {
  name: 'default',
  nextAction(battle, side) {
    const combatant = battle.active(side)
    if (combatant.hasFainted()) {
      return switchToFirstStanding(battle.party(side))
    }

    const usable = combatant.moveInfo().find((info) => info.uses > 0)
    return usable ? usable.move : flee()
  },
}

export const fleeingPolicy: DecisionPolicy = {
  name: 'fleeing',
  nextAction(battle, side) {
    if (battle.active(side).hasFainted()) {
      return switchToFirstStanding(battle.party(side))
    }
    return flee()
  },
}

export interface AntagonistOptions {
  /** Opposing combatant worth spending capture items on (case-insensitive). */
  target: string
}

/**
 * Scripted rival:
 * 1. replace a fainted combatant
 * 2. run from anything that is not a duel
 * 3. throw capture items at the target
 * 4. prefer moves that are super effective against the opponent
 * 5. any move with uses left
 * 6. flee
 */
export function antagonistPolicy(options: AntagonistOptions): DecisionPolicy {
  const target = options.target.toLowerCase()

  return {
    name: 'antagonist',
    nextAction(battle, side) {
      const party = battle.party(side)
      const combatant = battle.active(side)

      if (combatant.hasFainted()) {
        return switchToFirstStanding(party)
      }

      if (!battle.isDuel()) {
        return flee()
      }

      const opponent = battle.active(opposite(side))
      if (opponent.name.toLowerCase() === target) {
        for (const item of party.inventory().keys()) {
          if (item.effect === 'capture') {
            return item
          }
        }
      }

      const moves = combatant.moveInfo().filter((info) => info.uses > 0)
      const superEffective = moves.find(
        (info) => battle.elements.effectiveness(info.move.element, opponent.element) > 1,
      )
      if (superEffective) {
        return superEffective.move
      }

      return moves.length > 0 ? moves[0].move : flee()
    },
  }
}
