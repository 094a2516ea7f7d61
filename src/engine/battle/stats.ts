export const LEVEL_UP_STAT_GROWTH = 1.05

/**
 * Combat statistics. Values are frozen; every transformation returns a new
 * record. The same shape doubles as an additive modifier, whose fields may
 * be negative.
 */
export interface Stats {
  readonly hitChance: number
  readonly maxHealth: number
  readonly attack: number
  readonly defense: number
}

export type StatTuple = readonly [hitChance: number, maxHealth: number, attack: number, defense: number]

export function createStats(hitChance: number, maxHealth: number, attack: number, defense: number): Stats {
  return Object.freeze({ hitChance, maxHealth, attack, defense })
}

export function statsFromTuple([hitChance, maxHealth, attack, defense]: StatTuple): Stats {
  return createStats(hitChance, maxHealth, attack, defense)
}

export function toTuple(stats: Stats): StatTuple {
  return [stats.hitChance, stats.maxHealth, stats.attack, stats.defense]
}

export function applyModifier(stats: Stats, modifier: Stats): Stats {
  return createStats(
    Math.max(0, stats.hitChance + modifier.hitChance),
    Math.max(0, stats.maxHealth + modifier.maxHealth),
    Math.max(0, stats.attack + modifier.attack),
    Math.max(0, stats.defense + modifier.defense),
  )
}

// Hit chance resets to exactly 1; the rest grow by 5% and truncate.
export function levelUpStats(stats: Stats): Stats {
  return createStats(
    1,
    Math.trunc(stats.maxHealth * LEVEL_UP_STAT_GROWTH),
    Math.trunc(stats.attack * LEVEL_UP_STAT_GROWTH),
    Math.trunc(stats.defense * LEVEL_UP_STAT_GROWTH),
  )
}

export function formatStats(stats: Stats): string {
  return `Stats(${toTuple(stats).join(', ')})`
}
