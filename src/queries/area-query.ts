import { AreaNotFoundError } from '../errors.js';
import { FilterBuilder } from '../query/builder.js';
import type { ThingsDatabase } from '../store/database.js';
import { mapAreaRow, type AreaRow } from '../store/row-mapper.js';
import { buildAreasSQL, buildCountSQL } from '../store/schema.js';
import type { Area, QueryOptions } from '../types.js';
import { loadTagsOfArea } from './loaders.js';
import { TaskQuery, type Membership, type TaskQuerySettings } from './task-query.js';

export interface AreaCriteria {
  readonly uuid?: string;
  readonly title?: string;
  readonly visible?: boolean;
  /** Tag title, or presence of any tag. */
  readonly tag?: Membership;
  readonly includeItems: boolean;
}

/** Fluent immutable area query. */
export class AreaQuery {
  constructor(
    private readonly _db: ThingsDatabase,
    readonly criteria: AreaCriteria = { includeItems: false },
    private readonly _settings: TaskQuerySettings = { dateParsing: 'permissive' },
  ) {}

  private _with(patch: Partial<AreaCriteria>): AreaQuery {
    return new AreaQuery(this._db, { ...this.criteria, ...patch }, this._settings);
  }

  withUUID(uuid: string): AreaQuery {
    return this._with({ uuid });
  }

  withTitle(title: string): AreaQuery {
    return this._with({ title });
  }

  visible(visible: boolean): AreaQuery {
    return this._with({ visible });
  }

  inTag(tag: Membership): AreaQuery {
    return this._with({ tag });
  }

  /** Loads each area's tasks into `items`. */
  includeItems(includeItems = true): AreaQuery {
    return this._with({ includeItems });
  }

  whereClause(): string {
    const c = this.criteria;
    return FilterBuilder.empty
      .addEqual('AREA.uuid', c.uuid)
      .addEqual('AREA.title', c.title)
      .addTruthy('AREA.visible', c.visible)
      .addEqual('TAG.title', c.tag)
      .compile();
  }

  toSQL(): string {
    return buildAreasSQL(this.whereClause());
  }

  async all(options: QueryOptions = {}): Promise<Area[]> {
    const rows = await this._db.all<AreaRow>(this.toSQL(), [], options);
    const areas: Area[] = [];
    for (const row of rows) {
      const area = mapAreaRow(row);
      const tags = area.hasTags ? await loadTagsOfArea(this._db, area.uuid, options) : [];
      const items = this.criteria.includeItems
        ? await new TaskQuery(this._db, undefined, this._settings)
            .inArea(area.uuid)
            .contextTrashed(false)
            .includeItems(true)
            .all(options)
        : [];
      areas.push({ ...area, tags, items });
    }
    return areas;
  }

  /** @throws AreaNotFoundError when nothing matches */
  async first(options: QueryOptions = {}): Promise<Area> {
    const [area] = await this.all(options);
    if (area === undefined) {
      throw new AreaNotFoundError();
    }
    return area;
  }

  async count(options: QueryOptions = {}): Promise<number> {
    const row = await this._db.get<{ count: number }>(buildCountSQL(this.toSQL()), [], options);
    return row?.count ?? 0;
  }
}
