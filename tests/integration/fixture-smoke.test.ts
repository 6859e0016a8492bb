import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type Database from 'better-sqlite3';
import { createTestHandle, insertRow, packed, plistInteger, seedLibrary } from './helpers.js';

let handle: Database.Database;

beforeAll(() => {
  handle = createTestHandle();
  seedLibrary(handle);
});

afterAll(() => {
  handle.close();
});

describe('integration test fixture', () => {
  it('stores the database version as a plist integer', () => {
    const row = handle.prepare("SELECT value FROM Meta WHERE key = 'databaseVersion'").get();
    expect(row).toEqual({ value: plistInteger(26) });
  });

  it('packs dates the way the app does', () => {
    expect(packed(2021, 3, 28)).toBe(132464128);
  });

  it('seeds every task row', () => {
    expect(handle.prepare('SELECT COUNT(*) AS count FROM TMTask').get()).toEqual({ count: 15 });
  });

  it('insertRow quotes reserved column names', () => {
    insertRow(handle, 'TMTag', { uuid: 'tag-smoke', title: 'Smoke', index: 99 });
    expect(handle.prepare('SELECT "index" FROM TMTag WHERE uuid = ?').get('tag-smoke')).toEqual({ index: 99 });
  });
});
