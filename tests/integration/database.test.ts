import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openThingsClient } from '../../src/client.js';
import {
  DatabaseNotFoundError,
  DatabaseVersionError,
  ExecutionError,
  QueryCancelledError,
} from '../../src/errors.js';
import { createLogger } from '../../src/logger.js';
import { SqliteThingsDatabase } from '../../src/store/database.js';
import { createTestDatabase, createTestHandle, insertRow, seedLibrary, uuids } from './helpers.js';

let dir: string;

function writeDatabaseFile(version: string | number | null): string {
  const file = path.join(dir, 'main.sqlite');
  const handle = createTestHandle(file, version);
  seedLibrary(handle);
  handle.close();
  return file;
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'things-db-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('SqliteThingsDatabase', () => {
  it('opens a file read-only and runs queries', async () => {
    const db = await SqliteThingsDatabase.open(writeDatabaseFile(26), { logger: createLogger('silent') });
    expect(await db.get('SELECT COUNT(*) AS count FROM TMArea')).toEqual({ count: 2 });
    await expect(db.all("DELETE FROM TMArea WHERE uuid = 'area-home'")).rejects.toThrow(ExecutionError);
    await db.close();
  });

  it('close() can be called twice', async () => {
    const db = await SqliteThingsDatabase.open(writeDatabaseFile(26), { logger: createLogger('silent') });
    await db.close();
    await expect(db.close()).resolves.toBeUndefined();
  });

  it('rejects databases at or below the minimum version', async () => {
    const file = writeDatabaseFile(21);
    await expect(SqliteThingsDatabase.open(file, { logger: createLogger('silent') })).rejects.toThrow(
      DatabaseVersionError,
    );
  });

  it('fails with ExecutionError when the version is missing', async () => {
    const file = writeDatabaseFile(null);
    await expect(SqliteThingsDatabase.open(file, { logger: createLogger('silent') })).rejects.toThrow(
      'Failed to read database version',
    );
  });

  it('fails with ExecutionError when the file is not a database', async () => {
    const file = path.join(dir, 'main.sqlite');
    fs.writeFileSync(file, 'not a database');
    await expect(SqliteThingsDatabase.open(file, { logger: createLogger('silent') })).rejects.toThrow(
      ExecutionError,
    );
  });

  it('accepts a plain integer version', async () => {
    const handle = createTestHandle(':memory:', null);
    insertRow(handle, 'Meta', { key: 'databaseVersion', value: '26' });
    const db = createTestDatabase(handle);
    expect(await db.validateVersion()).toBe(26);
    await db.close();
  });

  it('wraps driver failures with the statement', async () => {
    const db = createTestDatabase(createTestHandle());
    const sql = 'SELECT * FROM TMMissing';
    await expect(db.all(sql)).rejects.toMatchObject({ name: 'ExecutionError', sql });
    await db.close();
  });

  it('rejects an aborted query with QueryCancelledError', async () => {
    const db = createTestDatabase(createTestHandle());
    const controller = new AbortController();
    controller.abort();
    await expect(db.all('SELECT 1', [], { signal: controller.signal })).rejects.toThrow(QueryCancelledError);
    await db.close();
  });

  it('binds positional parameters', async () => {
    const handle = createTestHandle();
    seedLibrary(handle);
    const db = createTestDatabase(handle);
    expect(await db.all('SELECT title FROM TMTag WHERE parent = ?', ['tag-errand'])).toEqual([{ title: 'Urgent' }]);
    await db.close();
  });
});

describe('openThingsClient', () => {
  it('opens the explicit database path', async () => {
    const file = writeDatabaseFile(26);
    const client = await openThingsClient({ databasePath: file, env: {} });
    expect(client.filepath).toBe(file);
    expect(uuids(await client.inbox())).toEqual(['todo-milk']);
    await client.close();
  });

  it('falls back to THINGSDB', async () => {
    const file = writeDatabaseFile(26);
    const client = await openThingsClient({ env: { THINGSDB: file } });
    expect(client.filepath).toBe(file);
    await client.close();
  });

  it('throws DatabaseNotFoundError for a missing file', async () => {
    await expect(openThingsClient({ databasePath: path.join(dir, 'missing.sqlite'), env: {} })).rejects.toThrow(
      DatabaseNotFoundError,
    );
  });

  it('cancels view queries through the signal', async () => {
    const client = await openThingsClient({ databasePath: writeDatabaseFile(26), env: {} });
    const controller = new AbortController();
    controller.abort();
    await expect(client.today({ signal: controller.signal })).rejects.toThrow(QueryCancelledError);
    await client.close();
  });
});
