import { resolveConfig, type ClientOptions } from './config.js';
import { AreaNotFoundError, AuthTokenNotFoundError, InvalidParameterError, TaskNotFoundError } from './errors.js';
import type { Logger } from './logger.js';
import { AreaQuery } from './queries/area-query.js';
import { loadChecklistItems } from './queries/loaders.js';
import { TagQuery } from './queries/tag-query.js';
import { TaskQuery, type TaskQuerySettings } from './queries/task-query.js';
import type { DateParsingMode } from './query/types.js';
import { SqliteThingsDatabase, type ThingsDatabase } from './store/database.js';
import { discoverDatabasePath } from './store/discovery.js';
import { AUTH_TOKEN_SQL, SETTINGS_UUID } from './store/schema.js';
import type { Area, ChecklistItem, QueryOptions, Tag, Task } from './types.js';

export interface ThingsClientSettings {
  dateParsing?: DateParsingMode;
  logger?: Logger;
}

/** Ascending by time; `null` sorts last. */
function compareDates(a: Date | null, b: Date | null): number {
  if (a === null) return b === null ? 0 : 1;
  if (b === null) return -1;
  return a.getTime() - b.getTime();
}

/** Descending by time; `null` still sorts last. */
function compareDatesDesc(a: Date | null, b: Date | null): number {
  if (a === null || b === null) return compareDates(a, b);
  return b.getTime() - a.getTime();
}

function isNotFound(err: unknown): boolean {
  return err instanceof TaskNotFoundError || err instanceof AreaNotFoundError;
}

/**
 * Read-only client over a Things database. Query builders start from
 * tasks(), areas() and tags(); the remaining methods are the views of the
 * app's sidebar built on top of them.
 */
export class ThingsClient {
  private readonly _settings: TaskQuerySettings;
  private readonly _logger: Logger | undefined;

  constructor(
    private readonly _db: ThingsDatabase,
    settings: ThingsClientSettings = {},
  ) {
    this._settings = { dateParsing: settings.dateParsing ?? 'permissive' };
    this._logger = settings.logger;
  }

  get filepath(): string {
    return this._db.filepath;
  }

  tasks(): TaskQuery {
    return new TaskQuery(this._db, undefined, this._settings);
  }

  areas(): AreaQuery {
    return new AreaQuery(this._db, undefined, this._settings);
  }

  tags(): TagQuery {
    return new TagQuery(this._db, undefined, this._settings);
  }

  checklistItems(todoUUID: string, options?: QueryOptions): Promise<ChecklistItem[]> {
    return loadChecklistItems(this._db, todoUUID, options);
  }

  /** Looks up a task, then an area, then a tag; `null` when none has the UUID. */
  async get(uuid: string, options?: QueryOptions): Promise<Task | Area | Tag | null> {
    try {
      return await this.tasks().withUUID(uuid).first(options);
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
    try {
      return await this.areas().withUUID(uuid).first(options);
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
    const [tag] = await this.tags().withUUID(uuid).all(options);
    return tag ?? null;
  }

  /** @throws AuthTokenNotFoundError when the settings row or token is missing */
  async authToken(options?: QueryOptions): Promise<string> {
    const row = await this._db.get<{ token: string | null }>(AUTH_TOKEN_SQL, [SETTINGS_UUID], options);
    if (row === undefined || row.token === null || row.token === '') {
      throw new AuthTokenNotFoundError();
    }
    return row.token;
  }

  todos(options?: QueryOptions): Promise<Task[]> {
    return this.tasks().type().todo().status().incomplete().contextTrashed(false).all(options);
  }

  projects(options?: QueryOptions): Promise<Task[]> {
    return this.tasks().type().project().status().incomplete().contextTrashed(false).all(options);
  }

  inbox(options?: QueryOptions): Promise<Task[]> {
    return this.tasks().start().inbox().status().incomplete().contextTrashed(false).all(options);
  }

  /**
   * Anytime tasks scheduled for a day, Someday tasks whose start date has
   * arrived and unscheduled tasks with an overdue deadline, sorted by today
   * index and then start date.
   */
  async today(options?: QueryOptions): Promise<Task[]> {
    const open = this.tasks().status().incomplete().contextTrashed(false);
    const scheduled = await open.startDate().exists(true).start().anytime().orderByTodayIndex().all(options);
    const arrived = await open.startDate().past().start().someday().orderByTodayIndex().all(options);
    const overdue = await open
      .startDate()
      .exists(false)
      .deadline()
      .past()
      .withDeadlineSuppressed(false)
      .all(options);
    return [...scheduled, ...arrived, ...overdue].sort(
      (a, b) => a.todayIndex - b.todayIndex || compareDates(a.startDate, b.startDate),
    );
  }

  upcoming(options?: QueryOptions): Promise<Task[]> {
    return this.tasks()
      .startDate()
      .future()
      .start()
      .someday()
      .status()
      .incomplete()
      .contextTrashed(false)
      .all(options);
  }

  anytime(options?: QueryOptions): Promise<Task[]> {
    return this.tasks().start().anytime().status().incomplete().contextTrashed(false).all(options);
  }

  someday(options?: QueryOptions): Promise<Task[]> {
    return this.tasks()
      .startDate()
      .exists(false)
      .start()
      .someday()
      .status()
      .incomplete()
      .contextTrashed(false)
      .all(options);
  }

  /** Completed and canceled tasks, most recently finished first. */
  async logbook(options?: QueryOptions): Promise<Task[]> {
    const completed = await this.completed(options);
    const canceled = await this.canceled(options);
    return [...completed, ...canceled].sort((a, b) => compareDatesDesc(a.stopDate, b.stopDate));
  }

  trash(options?: QueryOptions): Promise<Task[]> {
    return this.tasks().trashed(true).status().any().all(options);
  }

  completed(options?: QueryOptions): Promise<Task[]> {
    return this.tasks().status().completed().contextTrashed(false).all(options);
  }

  canceled(options?: QueryOptions): Promise<Task[]> {
    return this.tasks().status().canceled().contextTrashed(false).all(options);
  }

  /** Open tasks with a deadline, earliest first. */
  async deadlines(options?: QueryOptions): Promise<Task[]> {
    const tasks = await this.tasks().deadline().exists(true).status().incomplete().contextTrashed(false).all(options);
    return tasks.sort((a, b) => compareDates(a.deadline, b.deadline));
  }

  /**
   * Open tasks created after `since`, newest first.
   *
   * @throws InvalidParameterError when `since` is not a valid date
   */
  async createdWithin(since: Date, options?: QueryOptions): Promise<Task[]> {
    if (Number.isNaN(since.getTime())) {
      throw new InvalidParameterError('createdWithin requires a valid date');
    }
    const tasks = await this.tasks().createdAfter(since).status().incomplete().contextTrashed(false).all(options);
    return tasks.sort((a, b) => b.created.getTime() - a.created.getTime());
  }

  search(query: string, options?: QueryOptions): Promise<Task[]> {
    return this.tasks().search(query).status().incomplete().contextTrashed(false).all(options);
  }

  async close(): Promise<void> {
    await this._db.close();
    this._logger?.debug('client closed');
  }
}

/**
 * Resolves the database path, opens it read-only and validates its version.
 *
 * @throws DatabaseNotFoundError when no database file can be found
 * @throws DatabaseVersionError when the database is too old
 */
export async function openThingsClient(options: ClientOptions = {}): Promise<ThingsClient> {
  const config = resolveConfig(options);
  const filepath = discoverDatabasePath({
    databasePath: config.databasePath,
    envDatabasePath: config.envDatabasePath,
  });
  const db = await SqliteThingsDatabase.open(filepath, { logger: config.logger, logSQL: config.logSQL });
  return new ThingsClient(db, { dateParsing: config.dateParsing, logger: config.logger });
}
