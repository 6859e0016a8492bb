export class ThingsError extends Error {
  override readonly name: string = 'ThingsError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed date string passed to a strict parse entry point. */
export class FormatError extends ThingsError {
  override readonly name: string = 'FormatError';

  constructor(
    readonly input: string,
    readonly reason: string = 'expected YYYY-MM-DD',
  ) {
    super(`Invalid date format "${input}": ${reason}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type EntityKind = 'task' | 'area' | 'tag';

/** A single-result query matched zero rows. */
export class NotFoundError extends ThingsError {
  override readonly name: string = 'NotFoundError';

  constructor(
    readonly entity: EntityKind,
    message?: string,
  ) {
    super(message ?? `${entity} not found`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TaskNotFoundError extends NotFoundError {
  override readonly name = 'TaskNotFoundError';

  constructor(message?: string) {
    super('task', message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AreaNotFoundError extends NotFoundError {
  override readonly name = 'AreaNotFoundError';

  constructor(message?: string) {
    super('area', message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TagNotFoundError extends NotFoundError {
  override readonly name = 'TagNotFoundError';

  constructor(message?: string) {
    super('tag', message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The datastore failed while preparing, running or reading a statement. */
export class ExecutionError extends ThingsError {
  override readonly name: string = 'ExecutionError';

  constructor(
    message: string,
    readonly sql?: string,
    cause?: unknown,
  ) {
    super(message, cause);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class QueryCancelledError extends ExecutionError {
  override readonly name = 'QueryCancelledError';

  constructor(sql?: string, cause?: unknown) {
    super('Query cancelled', sql, cause);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DatabaseNotFoundError extends ThingsError {
  override readonly name = 'DatabaseNotFoundError';

  constructor(readonly path?: string) {
    super(path === undefined ? 'Things database not found' : `Things database not found: ${path}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DatabaseVersionError extends ThingsError {
  override readonly name = 'DatabaseVersionError';

  constructor(
    readonly actualVersion: number,
    readonly minimumVersion: number,
  ) {
    super(
      `Things database version ${actualVersion} is too old (requires a version above ${minimumVersion})`,
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidParameterError extends ThingsError {
  override readonly name = 'InvalidParameterError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AuthTokenNotFoundError extends ThingsError {
  override readonly name = 'AuthTokenNotFoundError';

  constructor() {
    super('URL scheme auth token not found');
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
