import { parseISODate, isISODate, todaySQLExpression, todayISOSQLExpression, toUnixSeconds } from '../date/codec.js';
import type { DateCriterion, DateEncoding, DateOperator, Filter } from './types.js';

/** Literal rendered for a WHERE clause with no effective conditions. */
export const SQL_TRUE = 'TRUE';

const OFFSET_PATTERN = /^(\d+)([dwy])$/;

/** Escapes a value for use inside a single-quoted SQL literal. */
export function escapeSQLString(value: string): string {
  return value.replaceAll("'", "''");
}

function quote(value: string): string {
  return `'${escapeSQLString(value)}'`;
}

function unixDateExpression(column: string): string {
  return `date(${column}, 'unixepoch', 'localtime')`;
}

/** SQL operator for a comparison DateOperator, `null` for the others. */
function comparisonOperator(op: DateOperator): string | null {
  switch (op) {
    case '=':
    case '<':
    case '<=':
    case '>':
    case '>=':
      return op;
    case 'exists':
    case 'not-exists':
    case 'future':
    case 'past':
      return null;
  }
}

/**
 * Renders a date constraint against a column in the given encoding. Future
 * is strictly after today; past includes today.
 */
function compileDateConstraint(
  column: string,
  encoding: DateEncoding,
  op: DateOperator,
  date: string | undefined,
): string {
  switch (op) {
    case 'exists':
      return `${column} IS NOT NULL`;
    case 'not-exists':
      return `${column} IS NULL`;
    case 'future':
      return encoding === 'packed'
        ? `${column} > ${todaySQLExpression()}`
        : `${unixDateExpression(column)} > ${todayISOSQLExpression()}`;
    case 'past':
      return encoding === 'packed'
        ? `${column} <= ${todaySQLExpression()}`
        : `${unixDateExpression(column)} <= ${todayISOSQLExpression()}`;
    default:
      return compileDateComparison(column, encoding, op, date);
  }
}

function compileDateComparison(
  column: string,
  encoding: DateEncoding,
  operator: string,
  date: string | undefined,
): string {
  if (date === undefined || !isISODate(date)) return '';
  if (encoding === 'packed') {
    return `${column} ${operator} ${parseISODate(date)}`;
  }
  return `${unixDateExpression(column)} ${operator} date('${date}')`;
}

function compileCriterion(column: string, encoding: DateEncoding, criterion: DateCriterion): string {
  switch (criterion.kind) {
    case 'absent':
      return '';
    case 'exists':
      return criterion.present ? `${column} IS NOT NULL` : `${column} IS NULL`;
    case 'relative':
      return compileDateConstraint(column, encoding, criterion.when, undefined);
    case 'compare': {
      const operator = criterion.operator === '==' ? '=' : criterion.operator;
      return compileDateComparison(column, encoding, operator, criterion.date);
    }
  }
}

/** SQLite datetime modifier for an offset token, or `null` when malformed. */
export function offsetModifier(offset: string): string | null {
  const match = OFFSET_PATTERN.exec(offset);
  if (match === null) return null;
  const amount = Number(match[1]);
  switch (match[2]) {
    case 'd':
      return `-${amount} days`;
    case 'w':
      return `-${amount * 7} days`;
    case 'y':
      return `-${amount} years`;
    default:
      return null;
  }
}

/**
 * Compiles a single Filter into a SQL fragment. Inapplicable filters render
 * the empty string, never whitespace.
 */
export function compileFilter(node: Filter): string {
  switch (node.kind) {
    case 'static':
      return node.sql;

    case 'equal': {
      const { column, value } = node;
      if (value === null || value === undefined) return '';
      if (typeof value === 'boolean') {
        return value ? `${column} IS NOT NULL` : `${column} IS NULL`;
      }
      return `${column} = ${quote(String(value))}`;
    }

    case 'truthy':
      if (node.value === undefined) return '';
      return node.value ? node.column : `NOT IFNULL(${node.column}, 0)`;

    case 'or': {
      const parts = compileParts(node.filters);
      return parts.length === 0 ? '' : `(${parts.join(' OR ')})`;
    }

    case 'search': {
      if (node.query === '' || node.columns.length === 0) return '';
      const pattern = quote(`%${node.query}%`);
      return `(${node.columns.map((c) => `${c} LIKE ${pattern}`).join(' OR ')})`;
    }

    case 'prefix':
      if (node.prefix === '') return '';
      return `${node.column} LIKE ${quote(`${node.prefix}%`)}`;

    case 'packedDate':
      return compileDateConstraint(node.column, 'packed', node.op, node.date);

    case 'unixTime':
      return compileDateConstraint(node.column, 'unix', node.op, node.date);

    case 'unixTimeRange': {
      const modifier = offsetModifier(node.offset);
      if (modifier === null) return '';
      return `datetime(${node.column}, 'unixepoch', 'localtime') > datetime('now', '${modifier}')`;
    }

    case 'unixTimeAfter': {
      if (Number.isNaN(node.instant.getTime())) return '';
      return `${node.column} > ${toUnixSeconds(node.instant)}`;
    }

    case 'parsedDate':
      return compileCriterion(node.column, node.encoding, node.criterion);
  }
}

/**
 * True when the filter contributes nothing to a WHERE clause. Agrees with
 * `compileFilter(node) === ''` for every variant.
 */
export function isEmptyFilter(node: Filter): boolean {
  switch (node.kind) {
    case 'static':
      return node.sql === '';
    case 'equal':
      return node.value === null || node.value === undefined;
    case 'truthy':
      return node.value === undefined;
    case 'or':
      return node.filters.every(isEmptyFilter);
    case 'search':
      return node.query === '' || node.columns.length === 0;
    case 'prefix':
      return node.prefix === '';
    case 'packedDate':
    case 'unixTime': {
      const operator = comparisonOperator(node.op);
      if (operator === null) return false;
      return node.date === undefined || !isISODate(node.date);
    }
    case 'unixTimeRange':
      return offsetModifier(node.offset) === null;
    case 'unixTimeAfter':
      return Number.isNaN(node.instant.getTime());
    case 'parsedDate':
      if (node.criterion.kind === 'compare') return !isISODate(node.criterion.date);
      return node.criterion.kind === 'absent';
  }
}

function compileParts(filters: readonly Filter[]): string[] {
  return filters.filter((f) => !isEmptyFilter(f)).map(compileFilter);
}

/**
 * Compiles a list of filters into a WHERE predicate: non-empty members joined
 * with AND in order, or `TRUE` when nothing remains.
 */
export function compileFilters(filters: readonly Filter[]): string {
  const parts = compileParts(filters);
  return parts.length === 0 ? SQL_TRUE : parts.join(' AND ');
}
