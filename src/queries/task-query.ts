import { toISODate } from '../date/codec.js';
import { InvalidParameterError, TaskNotFoundError } from '../errors.js';
import { FilterBuilder } from '../query/builder.js';
import { filter, parseDateCriterion } from '../query/filters.js';
import type { DateComparison, DateCriterion, DateParsingMode } from '../query/types.js';
import type { ThingsDatabase } from '../store/database.js';
import { mapTaskRow, type TaskRow } from '../store/row-mapper.js';
import {
  COL_CREATION_DATE,
  COL_DEADLINE,
  COL_START_DATE,
  COL_STOP_DATE,
  FILTER_IS_ANYTIME,
  FILTER_IS_CANCELED,
  FILTER_IS_COMPLETED,
  FILTER_IS_HEADING,
  FILTER_IS_INBOX,
  FILTER_IS_INCOMPLETE,
  FILTER_IS_NOT_RECURRING,
  FILTER_IS_NOT_TRASHED,
  FILTER_IS_PROJECT,
  FILTER_IS_SOMEDAY,
  FILTER_IS_TODO,
  FILTER_IS_TRASHED,
  INDEX_DEFAULT,
  INDEX_TODAY,
  buildCountSQL,
  buildTasksSQL,
  type TaskOrderIndex,
} from '../store/schema.js';
import { StartBucket, Status, TaskType, type QueryOptions, type Task } from '../types.js';
import { loadChecklistItems, loadTagsOfTask } from './loaders.js';

/** Status constraint; `any` matches every status. */
export type StatusCriterion = Status | 'any';

/** A UUID to match, or `true`/`false` for "has one" / "has none". */
export type Membership = string | boolean;

export interface TaskCriteria {
  readonly type?: TaskType;
  readonly status?: StatusCriterion;
  readonly start?: StartBucket;
  readonly trashed?: boolean;
  readonly contextTrashed?: boolean;
  readonly uuid?: string;
  readonly uuidPrefix?: string;
  readonly area?: Membership;
  readonly project?: Membership;
  readonly heading?: Membership;
  /** Tag title, or presence of any tag. */
  readonly tag?: Membership;
  readonly deadlineSuppressed?: boolean;
  readonly startDate?: DateCriterion;
  readonly stopDate?: DateCriterion;
  readonly deadline?: DateCriterion;
  readonly last?: string;
  readonly createdAfter?: Date;
  readonly search?: string;
  readonly order: TaskOrderIndex;
  readonly includeItems: boolean;
}

export interface TaskQuerySettings {
  /** Treatment of malformed loosely typed dates passed to withStartDate & co. */
  readonly dateParsing: DateParsingMode;
}

const ABSENT: DateCriterion = { kind: 'absent' };

function typeSQL(type: TaskType | undefined): string {
  switch (type) {
    case TaskType.Todo:
      return `TASK.${FILTER_IS_TODO}`;
    case TaskType.Project:
      return `TASK.${FILTER_IS_PROJECT}`;
    case TaskType.Heading:
      return `TASK.${FILTER_IS_HEADING}`;
    case undefined:
      return '';
  }
}

function statusSQL(status: StatusCriterion | undefined): string {
  switch (status) {
    case Status.Incomplete:
      return `TASK.${FILTER_IS_INCOMPLETE}`;
    case Status.Canceled:
      return `TASK.${FILTER_IS_CANCELED}`;
    case Status.Completed:
      return `TASK.${FILTER_IS_COMPLETED}`;
    case 'any':
    case undefined:
      return '';
  }
}

function startSQL(start: StartBucket | undefined): string {
  switch (start) {
    case StartBucket.Inbox:
      return `TASK.${FILTER_IS_INBOX}`;
    case StartBucket.Anytime:
      return `TASK.${FILTER_IS_ANYTIME}`;
    case StartBucket.Someday:
      return `TASK.${FILTER_IS_SOMEDAY}`;
    case undefined:
      return '';
  }
}

/**
 * Fluent immutable task query. Every setter returns a new TaskQuery;
 * existing instances are never mutated.
 *
 * @example
 * client.tasks()
 *   .type().todo()
 *   .status().incomplete()
 *   .startDate().onOrBefore(new Date())
 *   .all()
 */
export class TaskQuery {
  constructor(
    private readonly _db: ThingsDatabase,
    readonly criteria: TaskCriteria = { order: INDEX_DEFAULT, includeItems: false },
    private readonly _settings: TaskQuerySettings = { dateParsing: 'permissive' },
  ) {}

  private _with(patch: Partial<TaskCriteria>): TaskQuery {
    return new TaskQuery(this._db, { ...this.criteria, ...patch }, this._settings);
  }

  type(): TypeSelector {
    return new TypeSelector((type) => this._with({ type }));
  }

  status(): StatusSelector {
    return new StatusSelector((status) => this._with({ status }));
  }

  start(): StartSelector {
    return new StartSelector((start) => this._with({ start }));
  }

  /** Packed start date ("When"). */
  startDate(): DateSelector {
    return new DateSelector((startDate) => this._with({ startDate }));
  }

  /** Completion or cancellation time. */
  stopDate(): DateSelector {
    return new DateSelector((stopDate) => this._with({ stopDate }));
  }

  deadline(): DateSelector {
    return new DateSelector((deadline) => this._with({ deadline }));
  }

  /**
   * Loosely typed start date: a boolean, `"future"`, `"past"` or an ISO
   * date with an optional comparison prefix such as `"<=2024-06-30"`.
   *
   * @throws FormatError for unrecognised input when dateParsing is strict
   */
  withStartDate(value: unknown): TaskQuery {
    return this._with({ startDate: parseDateCriterion(value, this._settings.dateParsing) });
  }

  /** @see withStartDate */
  withStopDate(value: unknown): TaskQuery {
    return this._with({ stopDate: parseDateCriterion(value, this._settings.dateParsing) });
  }

  /** @see withStartDate */
  withDeadline(value: unknown): TaskQuery {
    return this._with({ deadline: parseDateCriterion(value, this._settings.dateParsing) });
  }

  withUUID(uuid: string): TaskQuery {
    return this._with({ uuid });
  }

  withUUIDPrefix(uuidPrefix: string): TaskQuery {
    return this._with({ uuidPrefix });
  }

  inArea(area: Membership): TaskQuery {
    return this._with({ area });
  }

  /** Matches tasks directly in the project and tasks under its headings. */
  inProject(project: Membership): TaskQuery {
    return this._with({ project });
  }

  inHeading(heading: Membership): TaskQuery {
    return this._with({ heading });
  }

  inTag(tag: Membership): TaskQuery {
    return this._with({ tag });
  }

  withDeadlineSuppressed(deadlineSuppressed: boolean): TaskQuery {
    return this._with({ deadlineSuppressed });
  }

  /** Trashed tasks only (`true`) or untrashed only (`false`, the default). */
  trashed(trashed: boolean): TaskQuery {
    return this._with({ trashed });
  }

  /** Constrains the trash state of the enclosing project and heading's project. */
  contextTrashed(contextTrashed: boolean): TaskQuery {
    return this._with({ contextTrashed });
  }

  /** Created within the last `offset`: `3d`, `2w` or `1y`. Other input is ignored. */
  last(offset: string): TaskQuery {
    return this._with({ last: offset });
  }

  createdAfter(instant: Date): TaskQuery {
    return this._with({ createdAfter: instant });
  }

  /** Substring match on task title, notes and area title. */
  search(query: string): TaskQuery {
    return this._with({ search: query });
  }

  orderByTodayIndex(): TaskQuery {
    return this._with({ order: INDEX_TODAY });
  }

  /** Loads checklists of to-dos and the child tasks of projects and headings. */
  includeItems(includeItems = true): TaskQuery {
    return this._with({ includeItems });
  }

  whereClause(): string {
    const c = this.criteria;
    const base = FilterBuilder.empty
      .addStatic(`TASK.${FILTER_IS_NOT_RECURRING}`)
      .addStatic(c.trashed === true ? `TASK.${FILTER_IS_TRASHED}` : `TASK.${FILTER_IS_NOT_TRASHED}`)
      .addTruthy('PROJECT.trashed', c.contextTrashed)
      .addTruthy('PROJECT_OF_HEADING.trashed', c.contextTrashed)
      .addStatic(typeSQL(c.type))
      .addStatic(statusSQL(c.status))
      .addStatic(startSQL(c.start))
      .addEqual('TASK.uuid', c.uuid)
      .addPrefix('TASK.uuid', c.uuidPrefix ?? '')
      .addEqual('TASK.area', c.area)
      .addOr(filter.equal('TASK.project', c.project), filter.equal('PROJECT_OF_HEADING.uuid', c.project))
      .addEqual('TASK.heading', c.heading)
      .addEqual('TAG.title', c.tag)
      .addEqual('TASK.deadlineSuppressionDate', c.deadlineSuppressed)
      .add(filter.dateCriterion(`TASK.${COL_START_DATE}`, c.startDate ?? ABSENT, 'packed'))
      .add(filter.dateCriterion(`TASK.${COL_STOP_DATE}`, c.stopDate ?? ABSENT, 'unix'))
      .add(filter.dateCriterion(`TASK.${COL_DEADLINE}`, c.deadline ?? ABSENT, 'packed'))
      .addUnixTimeRange(`TASK.${COL_CREATION_DATE}`, c.last ?? '');
    const created =
      c.createdAfter === undefined ? base : base.addUnixTimeAfter(`TASK.${COL_CREATION_DATE}`, c.createdAfter);
    return created.addSearch(c.search ?? '').compile();
  }

  toSQL(): string {
    return buildTasksSQL(this.whereClause(), this.criteria.order);
  }

  async all(options: QueryOptions = {}): Promise<Task[]> {
    const rows = await this._db.all<TaskRow>(this.toSQL(), [], options);
    const tasks: Task[] = [];
    for (const row of rows) {
      tasks.push(await this._hydrate(mapTaskRow(row), options));
    }
    return tasks;
  }

  /**
   * First matching task with its items loaded.
   *
   * @throws TaskNotFoundError when nothing matches
   */
  async first(options: QueryOptions = {}): Promise<Task> {
    const [task] = await this.includeItems(true).all(options);
    if (task === undefined) {
      throw new TaskNotFoundError();
    }
    return task;
  }

  async count(options: QueryOptions = {}): Promise<number> {
    const row = await this._db.get<{ count: number }>(buildCountSQL(this.toSQL()), [], options);
    return row?.count ?? 0;
  }

  private async _hydrate(task: Task, options: QueryOptions): Promise<Task> {
    const tags = task.hasTags ? await loadTagsOfTask(this._db, task.uuid, options) : [];
    if (!this.criteria.includeItems) {
      return { ...task, tags };
    }
    switch (task.type) {
      case TaskType.Todo: {
        const checklist = task.hasChecklist ? await loadChecklistItems(this._db, task.uuid, options) : [];
        return { ...task, tags, checklist };
      }
      case TaskType.Project: {
        const items = await this._child().inProject(task.uuid).all(options);
        return { ...task, tags, items };
      }
      case TaskType.Heading: {
        const items = await this._child().type().todo().inHeading(task.uuid).all(options);
        return { ...task, tags, items };
      }
    }
  }

  private _child(): TaskQuery {
    return new TaskQuery(this._db, undefined, this._settings).contextTrashed(false).includeItems(true);
  }
}

/** Intermediate builder step: awaits the task type. */
export class TypeSelector {
  constructor(private readonly _apply: (type: TaskType) => TaskQuery) {}

  todo(): TaskQuery {
    return this._apply(TaskType.Todo);
  }

  project(): TaskQuery {
    return this._apply(TaskType.Project);
  }

  heading(): TaskQuery {
    return this._apply(TaskType.Heading);
  }
}

/** Intermediate builder step: awaits the status. */
export class StatusSelector {
  constructor(private readonly _apply: (status: StatusCriterion) => TaskQuery) {}

  incomplete(): TaskQuery {
    return this._apply(Status.Incomplete);
  }

  completed(): TaskQuery {
    return this._apply(Status.Completed);
  }

  canceled(): TaskQuery {
    return this._apply(Status.Canceled);
  }

  /** Removes any status constraint. */
  any(): TaskQuery {
    return this._apply('any');
  }
}

/** Intermediate builder step: awaits the start bucket. */
export class StartSelector {
  constructor(private readonly _apply: (start: StartBucket) => TaskQuery) {}

  inbox(): TaskQuery {
    return this._apply(StartBucket.Inbox);
  }

  anytime(): TaskQuery {
    return this._apply(StartBucket.Anytime);
  }

  someday(): TaskQuery {
    return this._apply(StartBucket.Someday);
  }
}

/**
 * Intermediate builder step: awaits a date constraint. Dates compare by
 * local calendar day; the time of day is ignored.
 */
export class DateSelector {
  constructor(private readonly _apply: (criterion: DateCriterion) => TaskQuery) {}

  exists(present = true): TaskQuery {
    return this._apply({ kind: 'exists', present });
  }

  /** Strictly after today. */
  future(): TaskQuery {
    return this._apply({ kind: 'relative', when: 'future' });
  }

  /** Today or earlier. */
  past(): TaskQuery {
    return this._apply({ kind: 'relative', when: 'past' });
  }

  on(date: Date): TaskQuery {
    return this._compare('==', date);
  }

  before(date: Date): TaskQuery {
    return this._compare('<', date);
  }

  onOrBefore(date: Date): TaskQuery {
    return this._compare('<=', date);
  }

  after(date: Date): TaskQuery {
    return this._compare('>', date);
  }

  onOrAfter(date: Date): TaskQuery {
    return this._compare('>=', date);
  }

  private _compare(operator: DateComparison, date: Date): TaskQuery {
    if (Number.isNaN(date.getTime())) {
      throw new InvalidParameterError('Invalid date');
    }
    return this._apply({ kind: 'compare', operator, date: toISODate(date) });
  }
}
