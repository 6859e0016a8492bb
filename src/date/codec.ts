import { FormatError } from '../errors.js';

/**
 * Packed date layout: YYYYYYYYYYYMMMMDDDDD0000000
 * (year in bits 16-26, month in bits 12-15, day in bits 7-11).
 */
export const YEAR_MASK = 0b111111111110000000000000000;
export const MONTH_MASK = 0b000000000001111000000000000;
export const DAY_MASK = 0b000000000000000111110000000;

/** Largest year the 11-bit year field holds. */
export const MAX_PACKED_YEAR = 2047;

/**
 * Packed time-of-day layout: hhhhhmmmmmm00000000000000000000
 * (hour in bits 26-30, minute in bits 20-25).
 */
export const HOUR_MASK = 0b1111100000000000000000000000000;
export const MINUTE_MASK = 0b0000011111100000000000000000000;

export interface CalendarDate {
  readonly year: number;
  readonly month: number; // 1-12
  readonly day: number;
}

export interface TimeOfDay {
  readonly hour: number;
  readonly minute: number;
}

export const ZERO_DATE: CalendarDate = Object.freeze({ year: 0, month: 0, day: 0 });
export const ZERO_TIME: TimeOfDay = Object.freeze({ hour: 0, minute: 0 });

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isZeroDate(date: CalendarDate): boolean {
  return date.year === 0 && date.month === 0 && date.day === 0;
}

export function decodeDate(packed: number): CalendarDate {
  if (packed <= 0) return ZERO_DATE;
  return {
    year: (packed & YEAR_MASK) >> 16,
    month: (packed & MONTH_MASK) >> 12,
    day: (packed & DAY_MASK) >> 7,
  };
}

/**
 * Packs a calendar date. Only years up to MAX_PACKED_YEAR survive a decode.
 * Month and day are not range-checked: values outside 1-12 / 1-31 bleed into
 * neighbouring fields.
 */
export function encodeDate(date: CalendarDate): number {
  if (isZeroDate(date)) return 0;
  return (date.year << 16) | (date.month << 12) | (date.day << 7);
}

export function decodeTime(packed: number): TimeOfDay {
  if (packed <= 0) return ZERO_TIME;
  return {
    hour: (packed & HOUR_MASK) >> 26,
    minute: (packed & MINUTE_MASK) >> 20,
  };
}

export function encodeTime(time: TimeOfDay): number {
  return (time.hour << 26) | (time.minute << 20);
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return DAYS_IN_MONTH[month - 1] ?? 0;
}

/** Local midnight of a calendar day; years 0-99 are not shifted into the 1900s. */
export function localMidnight(year: number, month: number, day: number): Date {
  const date = new Date(2000, 0, 1);
  date.setFullYear(year, month - 1, day);
  return date;
}

/**
 * Parses an ISO date string into a calendar date, or `null` when the string
 * is not `YYYY-MM-DD`, does not name a real Gregorian day, or lies past
 * MAX_PACKED_YEAR.
 */
export function parseCalendarDate(value: string): CalendarDate | null {
  const match = ISO_DATE_PATTERN.exec(value);
  if (match === null) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year > MAX_PACKED_YEAR) return null;
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

export function isISODate(value: string): boolean {
  return parseCalendarDate(value) !== null;
}

/**
 * Strict parse of `YYYY-MM-DD` into a packed date. The empty string is the
 * absence marker and yields 0.
 *
 * @throws FormatError for any other string that is not a valid date
 */
export function parseISODate(value: string): number {
  if (value === '') return 0;
  const date = parseCalendarDate(value);
  if (date === null) {
    throw new FormatError(value);
  }
  return encodeDate(date);
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatCalendarDate(date: CalendarDate): string {
  if (isZeroDate(date)) return '';
  return `${String(date.year).padStart(4, '0')}-${pad2(date.month)}-${pad2(date.day)}`;
}

export function formatPackedDate(packed: number): string {
  return formatCalendarDate(decodeDate(packed));
}

export function formatPackedTime(packed: number): string {
  if (packed <= 0) return '';
  const { hour, minute } = decodeTime(packed);
  return `${pad2(hour)}:${pad2(minute)}`;
}

/** Packs the local calendar date of `date`; `null` packs to 0. */
export function dateToPacked(date: Date | null): number {
  if (date === null || Number.isNaN(date.getTime())) return 0;
  return encodeDate({ year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() });
}

/** Local midnight of a packed date, or `null` when absent. */
export function packedToDate(packed: number): Date | null {
  if (packed <= 0) return null;
  const { year, month, day } = decodeDate(packed);
  return localMidnight(year, month, day);
}

/** ISO date string of the local calendar day of `date`. */
export function toISODate(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

export function decodeUnixSeconds(seconds: number): Date | null {
  if (!(seconds > 0)) return null;
  return new Date(Math.floor(seconds) * 1000);
}

export function toUnixSeconds(date: Date | null): number {
  if (date === null || Number.isNaN(date.getTime())) return 0;
  return Math.floor(date.getTime() / 1000);
}

const LOCAL_TODAY = "date('now', 'localtime')";

/**
 * SQL expression evaluating to today's packed date. Evaluated by the
 * database so relative comparisons use the clock at query time.
 */
export function todaySQLExpression(): string {
  return (
    `((strftime('%Y', ${LOCAL_TODAY}) << 16) | ` +
    `(strftime('%m', ${LOCAL_TODAY}) << 12) | ` +
    `(strftime('%d', ${LOCAL_TODAY}) << 7))`
  );
}

/** SQL expression for today's local date as `YYYY-MM-DD`. */
export function todayISOSQLExpression(): string {
  return LOCAL_TODAY;
}

/** SQL `CASE` decoding a packed date expression into `YYYY-MM-DD`. */
export function packedDateSQLToISO(expr: string): string {
  const year = `(${expr} & ${YEAR_MASK}) >> 16`;
  const month = `(${expr} & ${MONTH_MASK}) >> 12`;
  const day = `(${expr} & ${DAY_MASK}) >> 7`;
  return `CASE WHEN ${expr} THEN printf('%04d-%02d-%02d', ${year}, ${month}, ${day}) ELSE ${expr} END`;
}

/** SQL `CASE` decoding a packed time-of-day expression into `HH:MM`. */
export function packedTimeSQLToISO(expr: string): string {
  const hour = `(${expr} & ${HOUR_MASK}) >> 26`;
  const minute = `(${expr} & ${MINUTE_MASK}) >> 20`;
  return `CASE WHEN ${expr} THEN printf('%02d:%02d', ${hour}, ${minute}) ELSE ${expr} END`;
}
