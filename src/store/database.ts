import Database from 'better-sqlite3';
import type { Logger } from '../logger.js';
import type { QueryOptions, SQLParam } from '../types.js';
import { DatabaseVersionError, ExecutionError, QueryCancelledError } from '../errors.js';
import { DATABASE_VERSION_SQL, MIN_DATABASE_VERSION } from './schema.js';

/**
 * Read-only access to the datastore. Every call accepts an AbortSignal; an
 * aborted signal rejects with QueryCancelledError instead of a result.
 */
export interface ThingsDatabase {
  readonly filepath: string;
  all<T>(sql: string, params?: readonly SQLParam[], options?: QueryOptions): Promise<T[]>;
  get<T>(sql: string, params?: readonly SQLParam[], options?: QueryOptions): Promise<T | undefined>;
  close(): Promise<void>;
}

export interface SqliteDatabaseConfig {
  logger: Logger;
  /** Log statements at info instead of debug. */
  logSQL?: boolean;
}

const PLIST_INTEGER = /<integer>(\d+)<\/integer>/;

/** Reads `databaseVersion` from a plain integer or a plist `<integer>` value. */
export function parseDatabaseVersion(value: string): number | null {
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed);
  const match = PLIST_INTEGER.exec(trimmed);
  return match?.[1] === undefined ? null : Number(match[1]);
}

function throwIfAborted(signal: AbortSignal | undefined, sql: string): void {
  if (signal?.aborted) {
    throw new QueryCancelledError(sql, signal.reason);
  }
}

export class SqliteThingsDatabase implements ThingsDatabase {
  private readonly logger: Logger;
  private readonly logSQL: boolean;
  private queryCount = 0;

  constructor(
    private readonly handle: Database.Database,
    readonly filepath: string,
    config: SqliteDatabaseConfig,
  ) {
    this.logger = config.logger.child({ db: filepath });
    this.logSQL = config.logSQL ?? false;
  }

  /**
   * Opens the file read-only and checks the schema version.
   *
   * @throws ExecutionError when the file cannot be opened as SQLite
   * @throws DatabaseVersionError for databases at or below the minimum version
   */
  static async open(filepath: string, config: SqliteDatabaseConfig): Promise<SqliteThingsDatabase> {
    let handle: Database.Database;
    try {
      handle = new Database(filepath, { readonly: true, fileMustExist: true });
    } catch (err) {
      throw new ExecutionError(`Failed to open database: ${String(err)}`, undefined, err);
    }
    const db = new SqliteThingsDatabase(handle, filepath, config);
    try {
      await db.validateVersion();
    } catch (err) {
      await db.close();
      throw err;
    }
    config.logger.info({ db: filepath }, 'opened Things database');
    return db;
  }

  async validateVersion(): Promise<number> {
    const row = await this.get<{ value: string | number }>(DATABASE_VERSION_SQL);
    const version = row === undefined ? null : parseDatabaseVersion(String(row.value));
    if (version === null) {
      throw new ExecutionError('Failed to read database version', DATABASE_VERSION_SQL);
    }
    if (version <= MIN_DATABASE_VERSION) {
      throw new DatabaseVersionError(version, MIN_DATABASE_VERSION);
    }
    this.logger.debug({ version }, 'database version accepted');
    return version;
  }

  async all<T>(sql: string, params: readonly SQLParam[] = [], options: QueryOptions = {}): Promise<T[]> {
    throwIfAborted(options.signal, sql);
    this.trace(sql, params);
    let rows: T[];
    try {
      rows = this.handle.prepare<SQLParam[], T>(sql).all(...params);
    } catch (err) {
      throw new ExecutionError(`Failed to execute query: ${String(err)}`, sql, err);
    }
    throwIfAborted(options.signal, sql);
    return rows;
  }

  async get<T>(sql: string, params: readonly SQLParam[] = [], options: QueryOptions = {}): Promise<T | undefined> {
    throwIfAborted(options.signal, sql);
    this.trace(sql, params);
    let row: T | undefined;
    try {
      row = this.handle.prepare<SQLParam[], T>(sql).get(...params);
    } catch (err) {
      throw new ExecutionError(`Failed to execute query: ${String(err)}`, sql, err);
    }
    throwIfAborted(options.signal, sql);
    return row;
  }

  async close(): Promise<void> {
    if (!this.handle.open) return;
    this.handle.close();
    this.logger.debug({ queries: this.queryCount }, 'closed Things database');
  }

  private trace(sql: string, params: readonly SQLParam[]): void {
    this.queryCount += 1;
    const entry = { query: this.queryCount, sql, params };
    if (this.logSQL) {
      this.logger.info(entry, 'executing query');
    } else {
      this.logger.debug(entry, 'executing query');
    }
  }
}
