import type { ContentConfig, StatBlock } from './schema'

export const DEFAULT_STATS: StatBlock = { hitChance: 1, maxHealth: 100, attack: 100, defense: 100 }

export const ZERO_MODIFIER: StatBlock = { hitChance: 0, maxHealth: 0, attack: 0, defense: 0 }

export const DEFAULTS: ContentConfig = {
  __version: 1,
  elementMatrix: {},
  moves: {
    tackle: { kind: 'attack', name: 'Tackle', element: 'normal', maxUses: 35, speed: 100, baseDamage: 40, hitChance: 0.95 },
  },
  items: {},
  parties: {},
  wild: {},
  antagonistTarget: 'Voltmouse',
}
