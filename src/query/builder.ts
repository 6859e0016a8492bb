import { filter } from './filters.js';
import { compileFilters, isEmptyFilter } from './compiler.js';
import type { DateOperator, DateParsingMode, EqualValue, Filter } from './types.js';

/**
 * Fluent immutable filter accumulator. Every add* call returns a new
 * FilterBuilder; existing instances are never mutated, so a partially built
 * value can be shared and extended in different directions.
 *
 * Filters are AND-ed in append order. Duplicate or conflicting filters on the
 * same column are kept as independent terms.
 */
export class FilterBuilder {
  static readonly empty = new FilterBuilder([]);

  constructor(readonly filters: readonly Filter[]) {}

  add(f: Filter): FilterBuilder {
    return new FilterBuilder([...this.filters, f]);
  }

  addStatic(sql: string): FilterBuilder {
    return this.add(filter.static(sql));
  }

  addEqual(column: string, value: EqualValue): FilterBuilder {
    return this.add(filter.equal(column, value));
  }

  addTruthy(column: string, value: boolean | undefined): FilterBuilder {
    return this.add(filter.truthy(column, value));
  }

  addOr(...filters: Filter[]): FilterBuilder {
    return this.add(filter.or(...filters));
  }

  addSearch(query: string, ...columns: string[]): FilterBuilder {
    return this.add(filter.search(query, ...columns));
  }

  addPrefix(column: string, prefix: string): FilterBuilder {
    return this.add(filter.prefix(column, prefix));
  }

  addPackedDate(column: string, op: DateOperator, date?: string): FilterBuilder {
    return this.add(filter.packedDate(column, op, date));
  }

  addUnixTime(column: string, op: DateOperator, date?: string): FilterBuilder {
    return this.add(filter.unixTime(column, op, date));
  }

  addUnixTimeRange(column: string, offset: string): FilterBuilder {
    return this.add(filter.unixTimeRange(column, offset));
  }

  addUnixTimeAfter(column: string, instant: Date): FilterBuilder {
    return this.add(filter.unixTimeAfter(column, instant));
  }

  addParsedPackedDate(column: string, value: unknown, mode?: DateParsingMode): FilterBuilder {
    return this.add(filter.parsedPackedDate(column, value, mode));
  }

  addParsedUnixTime(column: string, value: unknown, mode?: DateParsingMode): FilterBuilder {
    return this.add(filter.parsedUnixTime(column, value, mode));
  }

  /** True when compile() would render `TRUE`. */
  isEmpty(): boolean {
    return this.filters.every(isEmptyFilter);
  }

  /** Renders the accumulated filters as a WHERE predicate. */
  compile(): string {
    return compileFilters(this.filters);
  }
}
