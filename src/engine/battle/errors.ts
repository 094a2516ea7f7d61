import type { RosterEmpty } from './types'

export function rosterEmpty(owner: string): RosterEmpty {
  return { kind: 'roster-empty', owner }
}

/** Thrown only when a battle finds a party without an active combatant. */
export class RosterEmptyError extends Error {
  readonly owner: string

  constructor(owner: string) {
    super(`${owner || 'An anonymous party'} has no combatants.`)
    this.name = 'RosterEmptyError'
    this.owner = owner
  }
}
