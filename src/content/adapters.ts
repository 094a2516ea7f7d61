import type { CombatantDef, ContentConfig, ItemDef, MoveDef, PartyDef, StatBlock } from '@config/schema';
import { Combatant } from '@engine/battle/combatant';
import { ElementChart } from '@engine/battle/elements';
import { captureItem, restoreItem } from '@engine/battle/items';
import { attackMove, buffMove, debuffMove } from '@engine/battle/moves';
import { Party } from '@engine/battle/party';
import { createStats, type Stats } from '@engine/battle/stats';
import type { Item, Move } from '@engine/battle/types';
import logger from '@utils/logger';

/**
 * Runtime view of validated content. Move and item definitions are shared;
 * parties and wild combatants are built fresh on every call so battles never
 * share mutable state.
 */
export interface ContentBundle {
  elements: ElementChart;
  moves: ReadonlyMap<string, Move>;
  items: ReadonlyMap<string, Item>;
  antagonistTarget: string;
  partyIds(): string[];
  wildIds(): string[];
  party(id: string): Party | undefined;
  wild(id: string): Combatant | undefined;
}

export function toStats(block: StatBlock): Stats {
  return createStats(block.hitChance, block.maxHealth, block.attack, block.defense);
}

export function toElementChart(cfg: ContentConfig): ElementChart {
  const chart = new ElementChart();
  for (const [attacking, row] of Object.entries(cfg.elementMatrix)) {
    for (const [defending, multiplier] of Object.entries(row)) {
      chart.register(attacking, defending, multiplier);
    }
  }
  return chart;
}

export function toMove(def: MoveDef): Move {
  const base = { name: def.name, element: def.element, maxUses: def.maxUses, speed: def.speed };
  switch (def.kind) {
    case 'attack':
      return attackMove({ ...base, baseDamage: def.baseDamage, hitChance: def.hitChance });
    case 'buff':
      return buffMove({ ...base, modifier: toStats(def.modifier), rounds: def.rounds });
    case 'debuff':
      return debuffMove({ ...base, modifier: toStats(def.modifier), rounds: def.rounds });
    default: {
      const unreachable: never = def;
      return unreachable;
    }
  }
}

export function toItem(def: ItemDef): Item {
  switch (def.kind) {
    case 'capture':
      return captureItem(def.name, def.catchChance);
    case 'restore':
      return restoreItem(def.name, def.healthRestored);
    default: {
      const unreachable: never = def;
      return unreachable;
    }
  }
}

function mapEntries<D, R>(entries: Record<string, D>, convert: (def: D) => R): Map<string, R> {
  return new Map(Object.entries(entries).map(([id, def]) => [id, convert(def)]));
}

function toCombatant(def: CombatantDef, moves: ReadonlyMap<string, Move>, scope: string): Combatant {
  const known: Move[] = [];
  for (const id of def.moves) {
    const move = moves.get(id);
    if (move) {
      known.push(move);
    } else {
      logger.warn('content_unknown_move', { scope, combatant: def.name, move: id });
    }
  }
  return new Combatant({ name: def.name, element: def.element, stats: toStats(def.stats), moves: known, level: def.level });
}

function toParty(id: string, def: PartyDef, moves: ReadonlyMap<string, Move>, items: ReadonlyMap<string, Item>): Party {
  const party = new Party(def.name);
  for (const member of def.roster) {
    const combatant = toCombatant(member, moves, `parties.${id}`);
    if (party.canAdd(combatant)) {
      party.add(combatant);
    } else {
      logger.warn('content_roster_full', { party: id, combatant: member.name });
    }
  }
  for (const entry of def.items) {
    const item = items.get(entry.id);
    if (item) {
      party.addItem(item, entry.qty);
    } else {
      logger.warn('content_unknown_item', { party: id, item: entry.id });
    }
  }
  return party;
}

export function buildContent(cfg: ContentConfig): ContentBundle {
  const elements = toElementChart(cfg);
  const moves = mapEntries(cfg.moves, toMove);
  const items = mapEntries(cfg.items, toItem);

  return {
    elements,
    moves,
    items,
    antagonistTarget: cfg.antagonistTarget,
    partyIds: () => Object.keys(cfg.parties),
    wildIds: () => Object.keys(cfg.wild),
    party(id) {
      const def = cfg.parties[id];
      return def ? toParty(id, def, moves, items) : undefined;
    },
    wild(id) {
      const def = cfg.wild[id];
      return def ? toCombatant(def, moves, `wild.${id}`) : undefined;
    },
  };
}
