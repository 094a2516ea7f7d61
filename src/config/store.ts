import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import { validateAndRepair } from '@content/validate';
import logger from '@utils/logger';

import type { ContentConfig } from './schema';

export const BUNDLED_CONTENT_PATH = fileURLToPath(new URL('../../data/default-content.json', import.meta.url));

let current: ContentConfig = validateAndRepair({});
let hasHydrated = false;
let pendingLoad: Promise<ContentConfig> | null = null;
const subs = new Set<(cfg: ContentConfig) => void>();

function notify(cfg: ContentConfig) {
  for (const fn of subs) fn(cfg);
}

export function contentPath(): string {
  return process.env.BATTLE_CONTENT_PATH || BUNDLED_CONTENT_PATH;
}

async function readFromDisk(path: string): Promise<ContentConfig> {
  const raw = await readFile(path, 'utf8');
  return validateAndRepair(JSON.parse(raw));
}

async function resolveLoad(force: boolean, path: string): Promise<ContentConfig> {
  if (!force && hasHydrated) {
    return current;
  }
  if (!force && pendingLoad) {
    return pendingLoad;
  }
  const request = readFromDisk(path)
    .then((cfg) => {
      current = cfg;
      hasHydrated = true;
      logger.info('content_loaded', {
        path,
        moves: Object.keys(cfg.moves).length,
        items: Object.keys(cfg.items).length,
        parties: Object.keys(cfg.parties).length,
      });
      notify(cfg);
      return cfg;
    })
    .finally(() => {
      pendingLoad = null;
    });
  if (!force) {
    pendingLoad = request;
  }
  return request;
}

export async function load(options?: { force?: boolean; path?: string }): Promise<ContentConfig> {
  return resolveLoad(options?.force ?? false, options?.path ?? contentPath());
}

export function subscribe(fn: (cfg: ContentConfig) => void) {
  subs.add(fn);
  if (hasHydrated) {
    fn(current);
  } else if (pendingLoad) {
    pendingLoad.then(fn).catch((error: unknown) => {
      logger.error('content_subscription_failed', { message: error instanceof Error ? error.message : String(error) });
    });
  }
  return () => {
    subs.delete(fn);
  };
}

export const CONTENT = () => current;
