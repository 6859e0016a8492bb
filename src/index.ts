export { ThingsClient, openThingsClient } from './client.js';
export type { ThingsClientSettings } from './client.js';

export { TaskQuery, TypeSelector, StatusSelector, StartSelector, DateSelector } from './queries/task-query.js';
export type { TaskCriteria, TaskQuerySettings, StatusCriterion, Membership } from './queries/task-query.js';
export { AreaQuery } from './queries/area-query.js';
export type { AreaCriteria } from './queries/area-query.js';
export { TagQuery } from './queries/tag-query.js';
export type { TagCriteria } from './queries/tag-query.js';

export { FilterBuilder } from './query/builder.js';
export { filter, parseDateCriterion, DEFAULT_SEARCH_COLUMNS } from './query/filters.js';
export { compileFilter, compileFilters, isEmptyFilter, escapeSQLString, SQL_TRUE } from './query/compiler.js';
export type {
  Filter,
  FilterKind,
  DateOperator,
  DateComparison,
  DateCriterion,
  DateEncoding,
  DateParsingMode,
  EqualValue,
} from './query/types.js';

export {
  decodeDate,
  encodeDate,
  decodeTime,
  encodeTime,
  parseISODate,
  isISODate,
  formatPackedDate,
  formatPackedTime,
  formatCalendarDate,
  dateToPacked,
  packedToDate,
  decodeUnixSeconds,
  toUnixSeconds,
  toISODate,
  ZERO_DATE,
  ZERO_TIME,
  MAX_PACKED_YEAR,
} from './date/codec.js';
export type { CalendarDate, TimeOfDay } from './date/codec.js';
export * from './date/relative.js';

export { SqliteThingsDatabase, parseDatabaseVersion } from './store/database.js';
export type { ThingsDatabase, SqliteDatabaseConfig } from './store/database.js';
export { discoverDatabasePath, expandPath } from './store/discovery.js';

export { resolveConfig, parseEnv, ENV_DATABASE_PATH } from './config.js';
export type { ClientOptions, ResolvedConfig } from './config.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

export { TaskType, Status, StartBucket } from './types.js';
export type { Task, Area, Tag, ChecklistItem, ChecklistStatus, QueryOptions, SQLParam } from './types.js';

export {
  ThingsError,
  FormatError,
  NotFoundError,
  TaskNotFoundError,
  AreaNotFoundError,
  TagNotFoundError,
  ExecutionError,
  QueryCancelledError,
  DatabaseNotFoundError,
  DatabaseVersionError,
  InvalidParameterError,
  AuthTokenNotFoundError,
} from './errors.js';
export type { EntityKind } from './errors.js';
