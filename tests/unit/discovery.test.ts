import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { defaultDatabaseCandidates, discoverDatabasePath, expandPath } from '../../src/store/discovery.js';
import { DatabaseNotFoundError } from '../../src/errors.js';

const CONTAINER = 'Library/Group Containers/JLMPQHK86H.com.culturedcode.ThingsMac';
const BUNDLE = 'Things Database.thingsdatabase';

let home: string;

function touch(...segments: string[]): string {
  const file = path.join(home, ...segments);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, '');
  return file;
}

beforeEach(() => {
  home = fs.mkdtempSync(path.join(os.tmpdir(), 'things-home-'));
});

afterEach(() => {
  fs.rmSync(home, { recursive: true, force: true });
});

describe('expandPath', () => {
  it('expands a leading ~/', () => {
    expect(expandPath('~/db.sqlite', '/home/test')).toBe(path.join('/home/test', 'db.sqlite'));
  });

  it('expands a bare ~', () => {
    expect(expandPath('~', '/home/test')).toBe('/home/test');
  });

  it('leaves other paths alone', () => {
    expect(expandPath('/tmp/~db', '/home/test')).toBe('/tmp/~db');
  });
});

describe('defaultDatabaseCandidates', () => {
  it('lists only the legacy location when no data directories exist', () => {
    expect(defaultDatabaseCandidates(home)).toEqual([path.join(home, CONTAINER, BUNDLE, 'main.sqlite')]);
  });

  it('lists ThingsData-* directories before the legacy location', () => {
    fs.mkdirSync(path.join(home, CONTAINER, 'ThingsData-B2'), { recursive: true });
    fs.mkdirSync(path.join(home, CONTAINER, 'ThingsData-A1'), { recursive: true });
    fs.mkdirSync(path.join(home, CONTAINER, 'Other'), { recursive: true });
    expect(defaultDatabaseCandidates(home)).toEqual([
      path.join(home, CONTAINER, 'ThingsData-A1', BUNDLE, 'main.sqlite'),
      path.join(home, CONTAINER, 'ThingsData-B2', BUNDLE, 'main.sqlite'),
      path.join(home, CONTAINER, BUNDLE, 'main.sqlite'),
    ]);
  });
});

describe('discoverDatabasePath', () => {
  it('prefers the explicit path', () => {
    const explicit = touch('explicit.sqlite');
    touch('env.sqlite');
    expect(
      discoverDatabasePath({ databasePath: explicit, envDatabasePath: path.join(home, 'env.sqlite'), homeDir: home }),
    ).toBe(explicit);
  });

  it('falls back to the environment path', () => {
    const fromEnv = touch('env.sqlite');
    expect(discoverDatabasePath({ envDatabasePath: fromEnv, homeDir: home })).toBe(fromEnv);
  });

  it('expands ~ against the home directory', () => {
    const file = touch('db', 'main.sqlite');
    expect(discoverDatabasePath({ databasePath: '~/db/main.sqlite', homeDir: home })).toBe(file);
  });

  it('does not fall through when an explicit path is missing', () => {
    touch(CONTAINER, BUNDLE, 'main.sqlite');
    expect(() => discoverDatabasePath({ databasePath: path.join(home, 'missing.sqlite'), homeDir: home })).toThrow(
      DatabaseNotFoundError,
    );
  });

  it('finds the first existing default location', () => {
    const legacy = touch(CONTAINER, BUNDLE, 'main.sqlite');
    expect(discoverDatabasePath({ homeDir: home })).toBe(legacy);
  });

  it('prefers a ThingsData-* database over the legacy one', () => {
    touch(CONTAINER, BUNDLE, 'main.sqlite');
    const current = touch(CONTAINER, 'ThingsData-XYZ', BUNDLE, 'main.sqlite');
    expect(discoverDatabasePath({ homeDir: home })).toBe(current);
  });

  it('throws DatabaseNotFoundError when nothing exists', () => {
    expect(() => discoverDatabasePath({ homeDir: home })).toThrow(DatabaseNotFoundError);
  });
});
