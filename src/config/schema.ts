export type ElementName = string

export interface StatBlock {
  hitChance: number
  maxHealth: number
  attack: number
  defense: number
}

interface MoveDefBase {
  name: string
  element: ElementName
  maxUses: number
  speed: number
}

export interface AttackDef extends MoveDefBase {
  kind: 'attack'
  baseDamage: number
  hitChance: number
}

interface ModifierMoveDefBase extends MoveDefBase {
  modifier: StatBlock
  rounds: number
}

export interface BuffDef extends ModifierMoveDefBase {
  kind: 'buff'
}

export interface DebuffDef extends ModifierMoveDefBase {
  kind: 'debuff'
}

export type MoveDef = AttackDef | BuffDef | DebuffDef

export type ItemDef =
  | { kind: 'capture'; name: string; catchChance: number }
  | { kind: 'restore'; name: string; healthRestored: number }

export interface CombatantDef {
  name: string
  element: ElementName
  stats: StatBlock
  moves: string[]
  level: number
}

export interface InventoryEntry {
  id: string
  qty: number
}

export interface PartyDef {
  name: string
  roster: CombatantDef[]
  items: InventoryEntry[]
}

export interface ContentConfig {
  __version: number
  /** attacking element -> defending element -> multiplier */
  elementMatrix: Record<ElementName, Record<ElementName, number>>
  moves: Record<string, MoveDef>
  items: Record<string, ItemDef>
  parties: Record<string, PartyDef>
  wild: Record<string, CombatantDef>
  antagonistTarget: string
}
