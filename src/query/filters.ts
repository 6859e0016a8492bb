import { FormatError } from '../errors.js';
import { isISODate } from '../date/codec.js';
import type {
  DateComparison,
  DateCriterion,
  DateEncoding,
  DateOperator,
  DateParsingMode,
  EqualValue,
  Filter,
} from './types.js';

export const DEFAULT_SEARCH_COLUMNS: readonly string[] = Object.freeze(['TASK.title', 'TASK.notes', 'AREA.title']);

const DATE_WITH_OPERATOR = /^(=|==|<|<=|>|>=)?(\d{4}-\d{2}-\d{2})$/;

const COMPARISONS: readonly DateComparison[] = ['==', '=', '<', '<=', '>', '>='];

const ABSENT: DateCriterion = { kind: 'absent' };

function isDateComparison(value: string): value is DateComparison {
  return COMPARISONS.some((c) => c === value);
}

/**
 * Decides what a loosely typed date value means. Accepts `null`/`undefined`
 * or `""` (absent), a boolean (existence), `"future"`/`"past"`, or an ISO
 * date with an optional comparison prefix (`">=2024-01-01"`, default `==`).
 *
 * In `permissive` mode anything else is absent; in `strict` mode it throws.
 *
 * @throws FormatError in strict mode for values that match none of the forms
 */
export function parseDateCriterion(value: unknown, mode: DateParsingMode = 'permissive'): DateCriterion {
  if (value === null || value === undefined || value === '') return ABSENT;
  if (typeof value === 'boolean') return { kind: 'exists', present: value };
  if (typeof value === 'string') {
    if (value === 'future' || value === 'past') return { kind: 'relative', when: value };
    const match = DATE_WITH_OPERATOR.exec(value);
    const date = match?.[2];
    const operator = match?.[1] ?? '==';
    if (date !== undefined && isISODate(date) && isDateComparison(operator)) {
      return { kind: 'compare', operator, date };
    }
  }
  if (mode === 'strict') {
    throw new FormatError(String(value), 'expected a boolean, "future", "past" or [op]YYYY-MM-DD');
  }
  return ABSENT;
}

/**
 * Entry point for the filter algebra. Each constructor returns an immutable
 * Filter value; compile it with compileFilter() or collect it in a
 * FilterBuilder.
 *
 * @example
 * filter.or(
 *   filter.equal('TASK.project', uuid),
 *   filter.equal('PROJECT_OF_HEADING.uuid', uuid),
 * )
 */
export const filter = {
  static(sql: string): Filter {
    return { kind: 'static', sql };
  },

  equal(column: string, value: EqualValue): Filter {
    return { kind: 'equal', column, value };
  },

  truthy(column: string, value: boolean | undefined): Filter {
    return { kind: 'truthy', column, value };
  },

  or(...filters: Filter[]): Filter {
    return { kind: 'or', filters };
  },

  search(query: string, ...columns: string[]): Filter {
    return { kind: 'search', query, columns: columns.length > 0 ? columns : DEFAULT_SEARCH_COLUMNS };
  },

  prefix(column: string, prefix: string): Filter {
    return { kind: 'prefix', column, prefix };
  },

  packedDate(column: string, op: DateOperator, date?: string): Filter {
    return { kind: 'packedDate', column, op, date };
  },

  unixTime(column: string, op: DateOperator, date?: string): Filter {
    return { kind: 'unixTime', column, op, date };
  },

  /** Rows whose Unix timestamp falls within the last `offset` (`7d`, `2w`, `1y`). */
  unixTimeRange(column: string, offset: string): Filter {
    return { kind: 'unixTimeRange', column, offset };
  },

  unixTimeAfter(column: string, instant: Date): Filter {
    return { kind: 'unixTimeAfter', column, instant };
  },

  dateCriterion(column: string, criterion: DateCriterion, encoding: DateEncoding): Filter {
    return { kind: 'parsedDate', column, criterion, encoding };
  },

  parsedDate(
    column: string,
    value: unknown,
    encoding: DateEncoding,
    mode: DateParsingMode = 'permissive',
  ): Filter {
    return filter.dateCriterion(column, parseDateCriterion(value, mode), encoding);
  },

  parsedPackedDate(column: string, value: unknown, mode?: DateParsingMode): Filter {
    return filter.parsedDate(column, value, 'packed', mode);
  },

  parsedUnixTime(column: string, value: unknown, mode?: DateParsingMode): Filter {
    return filter.parsedDate(column, value, 'unix', mode);
  },
};
