import { TagNotFoundError } from '../errors.js';
import { FilterBuilder } from '../query/builder.js';
import type { ThingsDatabase } from '../store/database.js';
import { mapTagRow, type TagRow } from '../store/row-mapper.js';
import { buildCountSQL, buildTagsSQL } from '../store/schema.js';
import type { QueryOptions, Tag } from '../types.js';
import { AreaQuery } from './area-query.js';
import { TaskQuery, type TaskQuerySettings } from './task-query.js';

export interface TagCriteria {
  readonly uuid?: string;
  readonly title?: string;
  readonly parent?: string;
  readonly includeItems: boolean;
}

/** Fluent immutable tag query. */
export class TagQuery {
  constructor(
    private readonly _db: ThingsDatabase,
    readonly criteria: TagCriteria = { includeItems: false },
    private readonly _settings: TaskQuerySettings = { dateParsing: 'permissive' },
  ) {}

  private _with(patch: Partial<TagCriteria>): TagQuery {
    return new TagQuery(this._db, { ...this.criteria, ...patch }, this._settings);
  }

  withUUID(uuid: string): TagQuery {
    return this._with({ uuid });
  }

  withTitle(title: string): TagQuery {
    return this._with({ title });
  }

  withParent(parentUUID: string): TagQuery {
    return this._with({ parent: parentUUID });
  }

  /** Loads the areas and then the tasks carrying each tag into `items`. */
  includeItems(includeItems = true): TagQuery {
    return this._with({ includeItems });
  }

  whereClause(): string {
    const c = this.criteria;
    return FilterBuilder.empty
      .addEqual('uuid', c.uuid)
      .addEqual('title', c.title)
      .addEqual('parent', c.parent)
      .compile();
  }

  toSQL(): string {
    return buildTagsSQL(this.whereClause());
  }

  async all(options: QueryOptions = {}): Promise<Tag[]> {
    const rows = await this._db.all<TagRow>(this.toSQL(), [], options);
    const tags: Tag[] = [];
    for (const row of rows) {
      const tag = mapTagRow(row);
      if (!this.criteria.includeItems) {
        tags.push(tag);
        continue;
      }
      const areas = await new AreaQuery(this._db, undefined, this._settings).inTag(tag.title).all(options);
      const tasks = await new TaskQuery(this._db, undefined, this._settings)
        .inTag(tag.title)
        .contextTrashed(false)
        .all(options);
      tags.push({ ...tag, items: [...areas, ...tasks] });
    }
    return tags;
  }

  /** @throws TagNotFoundError when nothing matches */
  async first(options: QueryOptions = {}): Promise<Tag> {
    const [tag] = await this.all(options);
    if (tag === undefined) {
      throw new TagNotFoundError();
    }
    return tag;
  }

  async count(options: QueryOptions = {}): Promise<number> {
    const row = await this._db.get<{ count: number }>(buildCountSQL(this.toSQL()), [], options);
    return row?.count ?? 0;
  }
}
