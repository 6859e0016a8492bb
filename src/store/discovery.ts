import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DatabaseNotFoundError } from '../errors.js';

const GROUP_CONTAINER = '~/Library/Group Containers/JLMPQHK86H.com.culturedcode.ThingsMac';
const DATABASE_BUNDLE = 'Things Database.thingsdatabase';
const DATABASE_FILE = 'main.sqlite';
const DATA_DIR_PREFIX = 'ThingsData-';

export interface DiscoveryInput {
  /** Explicit path from client options. */
  databasePath?: string | undefined;
  /** Path from the THINGSDB environment variable. */
  envDatabasePath?: string | undefined;
  homeDir?: string;
}

/** Expands a leading `~` to the home directory. */
export function expandPath(p: string, homeDir: string = os.homedir()): string {
  if (p === '~') return homeDir;
  if (p.startsWith('~/')) return path.join(homeDir, p.slice(2));
  return p;
}

function requireFile(p: string): string {
  if (!fs.existsSync(p)) {
    throw new DatabaseNotFoundError(p);
  }
  return p;
}

/**
 * Candidate locations in lookup order: the `ThingsData-*` directories used by
 * current releases, then the legacy location directly in the container.
 */
export function defaultDatabaseCandidates(homeDir: string = os.homedir()): string[] {
  const container = expandPath(GROUP_CONTAINER, homeDir);
  const candidates: string[] = [];
  const entries = fs.existsSync(container) ? fs.readdirSync(container) : [];
  for (const entry of entries.sort()) {
    if (entry.startsWith(DATA_DIR_PREFIX)) {
      candidates.push(path.join(container, entry, DATABASE_BUNDLE, DATABASE_FILE));
    }
  }
  candidates.push(path.join(container, DATABASE_BUNDLE, DATABASE_FILE));
  return candidates;
}

/**
 * Resolves the database file: explicit path, then THINGSDB, then the
 * default install locations.
 *
 * @throws DatabaseNotFoundError when the chosen or any default path is missing
 */
export function discoverDatabasePath(input: DiscoveryInput = {}): string {
  const homeDir = input.homeDir ?? os.homedir();
  if (input.databasePath !== undefined) {
    return requireFile(expandPath(input.databasePath, homeDir));
  }
  if (input.envDatabasePath !== undefined) {
    return requireFile(expandPath(input.envDatabasePath, homeDir));
  }
  const found = defaultDatabaseCandidates(homeDir).find((p) => fs.existsSync(p));
  if (found === undefined) {
    throw new DatabaseNotFoundError();
  }
  return found;
}
