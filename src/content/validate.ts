import { DEFAULTS, DEFAULT_STATS, ZERO_MODIFIER } from '@config/defaults';
import type {
  CombatantDef,
  ContentConfig,
  InventoryEntry,
  ItemDef,
  MoveDef,
  PartyDef,
  StatBlock,
} from '@config/schema';
import logger from '@utils/logger';
import { z } from 'zod';

const coerceNumber = () =>
  z.preprocess((val) => {
    if (val === '' || val === null || val === undefined) return undefined;
    const num = Number(val);
    return Number.isFinite(num) ? num : undefined;
  }, z.number().finite().optional());

const stringValue = () =>
  z.preprocess((val) => {
    if (val === null || val === undefined) return undefined;
    return String(val);
  }, z.string());

const label = () => stringValue().pipe(z.string().trim().min(1));

const element = () => stringValue().catch('normal');

const count = (fallback: number) => coerceNumber().transform((val) => Math.max(0, Math.floor(val ?? fallback)));

const ratio = (fallback: number) => coerceNumber().transform((val) => Math.max(0, val ?? fallback));

const signed = (fallback: number) => coerceNumber().transform((val) => val ?? fallback);

// [hitChance, maxHealth, attack, defense] is accepted as shorthand.
const fromTuple = (val: unknown) =>
  Array.isArray(val) ? { hitChance: val[0], maxHealth: val[1], attack: val[2], defense: val[3] } : val;

const statBlock = (fallback: StatBlock) =>
  z.preprocess(
    fromTuple,
    z
      .object({
        hitChance: ratio(fallback.hitChance),
        maxHealth: count(fallback.maxHealth),
        attack: count(fallback.attack),
        defense: count(fallback.defense),
      })
      .strip(),
  ).catch({ ...fallback });

const modifierBlock = () =>
  z.preprocess(
    fromTuple,
    z
      .object({
        hitChance: signed(0),
        maxHealth: signed(0),
        attack: signed(0),
        defense: signed(0),
      })
      .strip(),
  ).catch({ ...ZERO_MODIFIER });

const moveBase = {
  name: label(),
  element: element(),
  maxUses: count(10),
  speed: signed(100),
};

const MoveSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('attack'), ...moveBase, baseDamage: count(40), hitChance: ratio(1) }).strip(),
  z.object({ kind: z.literal('buff'), ...moveBase, modifier: modifierBlock(), rounds: count(1) }).strip(),
  z.object({ kind: z.literal('debuff'), ...moveBase, modifier: modifierBlock(), rounds: count(1) }).strip(),
]);

const ItemSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('capture'), name: label(), catchChance: ratio(0.5) }).strip(),
  z.object({ kind: z.literal('restore'), name: label(), healthRestored: count(20) }).strip(),
]);

const CombatantSchema = z
  .object({
    name: label(),
    element: element(),
    stats: statBlock(DEFAULT_STATS),
    moves: z.array(stringValue()).catch([]),
    level: count(1).transform((val) => Math.max(1, val)),
  })
  .strip();

const InventoryEntrySchema = z
  .object({
    id: label(),
    qty: count(1),
  })
  .strip();

const PartyShellSchema = z
  .object({
    name: stringValue().catch(''),
    roster: z.array(z.unknown()).catch([]),
    items: z.array(z.unknown()).catch([]),
  })
  .strip();

const SectionSchema = z.record(z.unknown()).catch({});

const RootSchema = z
  .object({
    __version: coerceNumber(),
    elementMatrix: z.record(z.record(coerceNumber()).catch({})).catch({}),
    moves: SectionSchema,
    items: SectionSchema,
    parties: SectionSchema,
    wild: SectionSchema,
    antagonistTarget: stringValue().optional().catch(undefined),
  })
  .partial()
  .strip();

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function parseList<S extends z.ZodTypeAny>(section: string, entries: unknown[], schema: S): z.output<S>[] {
  const result: z.output<S>[] = [];
  entries.forEach((entry, index) => {
    const parsed = schema.safeParse(entry);
    if (parsed.success) {
      result.push(parsed.data);
    } else {
      logger.warn('content_entry_dropped', { section, index, issues: describeIssues(parsed.error) });
    }
  });
  return result;
}

function parseSection<S extends z.ZodTypeAny>(
  section: string,
  entries: Record<string, unknown> | undefined,
  schema: S,
): Record<string, z.output<S>> {
  const result: Record<string, z.output<S>> = {};
  for (const [id, entry] of Object.entries(entries ?? {})) {
    const parsed = schema.safeParse(entry);
    if (parsed.success) {
      result[id] = parsed.data;
    } else {
      logger.warn('content_entry_dropped', { section, id, issues: describeIssues(parsed.error) });
    }
  }
  return result;
}

function parseParties(entries: Record<string, unknown> | undefined): Record<string, PartyDef> {
  const shells = parseSection('parties', entries, PartyShellSchema);
  const result: Record<string, PartyDef> = {};
  for (const [id, shell] of Object.entries(shells)) {
    const roster: CombatantDef[] = parseList(`parties.${id}.roster`, shell.roster, CombatantSchema);
    const items: InventoryEntry[] = parseList(`parties.${id}.items`, shell.items, InventoryEntrySchema);
    result[id] = { name: shell.name, roster, items };
  }
  return result;
}

function repairMatrix(matrix: Record<string, Record<string, number | undefined>> | undefined) {
  const result: ContentConfig['elementMatrix'] = {};
  for (const [attacking, row] of Object.entries({ ...DEFAULTS.elementMatrix, ...(matrix ?? {}) })) {
    const repaired: Record<string, number> = {};
    for (const [defending, multiplier] of Object.entries(row)) {
      if (typeof multiplier === 'number' && multiplier > 0) {
        repaired[defending] = multiplier;
      } else {
        logger.warn('content_multiplier_dropped', { attacking, defending, multiplier });
      }
    }
    result[attacking] = repaired;
  }
  return result;
}

export function migrate(cfg: ContentConfig): ContentConfig {
  if (!cfg.__version || cfg.__version === 1) {
    return { ...cfg, __version: 1 };
  }
  return cfg;
}

/**
 * Parses untrusted content. Malformed entries are dropped with a warning and
 * missing sections fall back to DEFAULTS, so the result is always usable.
 */
export function validateAndRepair(input: unknown): ContentConfig {
  const parsed = RootSchema.safeParse(input ?? {});
  if (!parsed.success) {
    logger.warn('content_replaced_with_defaults', { issues: describeIssues(parsed.error) });
  }
  const root = parsed.success ? parsed.data : {};

  const moves: Record<string, MoveDef> = { ...DEFAULTS.moves, ...parseSection('moves', root.moves, MoveSchema) };
  const items: Record<string, ItemDef> = { ...DEFAULTS.items, ...parseSection('items', root.items, ItemSchema) };
  const wild: Record<string, CombatantDef> = { ...DEFAULTS.wild, ...parseSection('wild', root.wild, CombatantSchema) };

  return migrate({
    __version: root.__version ?? DEFAULTS.__version,
    elementMatrix: repairMatrix(root.elementMatrix),
    moves,
    items,
    parties: { ...DEFAULTS.parties, ...parseParties(root.parties) },
    wild,
    antagonistTarget: root.antagonistTarget || DEFAULTS.antagonistTarget,
  });
}
