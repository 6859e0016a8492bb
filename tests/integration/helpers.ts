import fs from 'node:fs';
import Database from 'better-sqlite3';
import { ThingsClient } from '../../src/client.js';
import { encodeDate } from '../../src/date/codec.js';
import { createLogger } from '../../src/logger.js';
import { SqliteThingsDatabase } from '../../src/store/database.js';
import { SETTINGS_UUID } from '../../src/store/schema.js';

type FixtureValue = string | number | null;
type FixtureRow = Record<string, FixtureValue>;

const SCHEMA_SQL = fs.readFileSync(new URL('./fixtures/schema.sql', import.meta.url), 'utf8');

export const AUTH_TOKEN = 'test-token';

/** Creates an empty Things schema. Pass a path to write a file instead of memory. */
export function createTestHandle(filepath = ':memory:', version: FixtureValue = 26): Database.Database {
  const handle = new Database(filepath);
  handle.exec(SCHEMA_SQL);
  if (version !== null) {
    insertRow(handle, 'Meta', { key: 'databaseVersion', value: plistInteger(version) });
  }
  return handle;
}

export function plistInteger(value: FixtureValue): string {
  return `<?xml version="1.0" encoding="UTF-8"?><plist version="1.0"><integer>${String(value)}</integer></plist>`;
}

export function insertRow(handle: Database.Database, table: string, row: FixtureRow): void {
  const columns = Object.keys(row);
  const sql = `INSERT INTO ${table} (${columns.map((c) => `"${c}"`).join(', ')}) VALUES (${columns
    .map((c) => `@${c}`)
    .join(', ')})`;
  handle.prepare<FixtureRow>(sql).run(row);
}

export function packed(year: number, month: number, day: number): number {
  return encodeDate({ year, month, day });
}

export function unixSeconds(iso: string): number {
  return Date.parse(iso) / 1000;
}

const CREATED = unixSeconds('2024-01-01T00:00:00Z');

function task(uuid: string, title: string, fields: FixtureRow = {}): FixtureRow {
  return { uuid, title, creationDate: CREATED, userModificationDate: CREATED, ...fields };
}

/**
 * A small library: one area with a tagged project, a heading and to-dos in
 * every start bucket, plus trashed, recurring and finished tasks.
 */
export function seedLibrary(handle: Database.Database): void {
  insertRow(handle, 'TMArea', { uuid: 'area-home', title: 'Home', visible: 1, index: 1 });
  insertRow(handle, 'TMArea', { uuid: 'area-work', title: 'Work', visible: null, index: 2 });

  insertRow(handle, 'TMTag', { uuid: 'tag-errand', title: 'Errand', shortcut: 'e', parent: null, index: 1 });
  insertRow(handle, 'TMTag', { uuid: 'tag-urgent', title: 'Urgent', shortcut: null, parent: 'tag-errand', index: 2 });
  insertRow(handle, 'TMAreaTag', { areas: 'area-home', tags: 'tag-errand' });

  const tasks: FixtureRow[] = [
    task('proj-renovate', 'Renovate', { type: 1, area: 'area-home', index: 1 }),
    task('proj-old', 'Old plan', { type: 1, trashed: 1, index: 2 }),
    task('head-kitchen', 'Kitchen', { type: 2, project: 'proj-renovate', index: 3 }),
    task('todo-milk', 'Buy milk', {
      start: 0,
      notes: 'semi-skimmed',
      index: 10,
      creationDate: unixSeconds('2100-01-01T00:00:00Z'),
    }),
    task('todo-shelf', 'Fix shelf', { project: 'proj-renovate', reminderTime: (9 << 26) | (30 << 20), index: 11 }),
    task('todo-paint', 'Paint wall', { heading: 'head-kitchen', index: 12 }),
    task('todo-taxes', 'File taxes', { status: 3, stopDate: unixSeconds('2024-04-10T12:00:00Z'), index: 13 }),
    task('todo-gym', 'Cancel gym', { status: 2, stopDate: unixSeconds('2024-04-11T12:00:00Z'), index: 14 }),
    task('todo-trashed', 'Old idea', { trashed: 1, index: 15 }),
    task('todo-orphan', 'Orphan', { project: 'proj-old', index: 16 }),
    task('todo-review', 'Weekly review', { rt1_recurrenceRule: 'FREQ=WEEKLY', index: 17 }),
    task('todo-piano', 'Learn piano', { start: 2, index: 18 }),
    task('todo-passport', 'Renew passport', { deadline: packed(2020, 1, 15), index: 19, todayIndex: 5 }),
    task('todo-dentist', 'Dentist', { start: 2, startDate: packed(2040, 12, 31), index: 20 }),
    task('todo-call', 'Call mom', { startDate: packed(2020, 6, 1), index: 21, todayIndex: 1 }),
  ];
  for (const row of tasks) {
    insertRow(handle, 'TMTask', row);
  }

  insertRow(handle, 'TMTaskTag', { tasks: 'todo-milk', tags: 'tag-errand' });
  insertRow(handle, 'TMTaskTag', { tasks: 'todo-milk', tags: 'tag-urgent' });

  insertRow(handle, 'TMChecklistItem', {
    uuid: 'check-screws',
    title: 'Buy screws',
    status: 3,
    stopDate: unixSeconds('2024-02-01T12:00:00Z'),
    creationDate: CREATED,
    userModificationDate: CREATED,
    task: 'todo-shelf',
    index: 1,
  });
  insertRow(handle, 'TMChecklistItem', {
    uuid: 'check-drill',
    title: 'Borrow drill',
    creationDate: CREATED,
    userModificationDate: CREATED,
    task: 'todo-shelf',
    index: 2,
  });

  insertRow(handle, 'TMSettings', { uuid: SETTINGS_UUID, uriSchemeAuthenticationToken: AUTH_TOKEN });
}

export function createTestDatabase(handle: Database.Database, filepath = ':memory:'): SqliteThingsDatabase {
  return new SqliteThingsDatabase(handle, filepath, { logger: createLogger('silent') });
}

/** A client over a freshly seeded in-memory library. */
export function createTestClient(): ThingsClient {
  const handle = createTestHandle();
  seedLibrary(handle);
  return new ThingsClient(createTestDatabase(handle));
}

export function uuids(items: ReadonlyArray<{ uuid: string }>): string[] {
  return items.map((item) => item.uuid);
}
