/** Operators accepted by the typed date filters. */
export type DateOperator =
  | 'exists'
  | 'not-exists'
  | 'future'
  | 'past'
  | '='
  | '<'
  | '<='
  | '>'
  | '>=';

/** Comparison operators accepted in loosely typed date strings (`<=2024-01-31`). */
export type DateComparison = '==' | '=' | '<' | '<=' | '>' | '>=';

/** Which integer encoding a date column is stored in. */
export type DateEncoding = 'packed' | 'unix';

/**
 * A date constraint decided once from caller input. Rendering never
 * inspects raw values: malformed input has already become `absent`.
 */
export type DateCriterion =
  | { kind: 'absent' }
  | { kind: 'exists'; present: boolean }
  | { kind: 'relative'; when: 'future' | 'past' }
  | { kind: 'compare'; operator: DateComparison; date: string };

/** Values an equality filter can compare against. `null`/`undefined` disable the filter. */
export type EqualValue = string | number | bigint | boolean | null | undefined;

export type Filter =
  | { kind: 'static'; sql: string }
  | { kind: 'equal'; column: string; value: EqualValue }
  | { kind: 'truthy'; column: string; value: boolean | undefined }
  | { kind: 'or'; filters: readonly Filter[] }
  | { kind: 'search'; query: string; columns: readonly string[] }
  | { kind: 'prefix'; column: string; prefix: string }
  | { kind: 'packedDate'; column: string; op: DateOperator; date: string | undefined }
  | { kind: 'unixTime'; column: string; op: DateOperator; date: string | undefined }
  | { kind: 'unixTimeRange'; column: string; offset: string }
  | { kind: 'unixTimeAfter'; column: string; instant: Date }
  | { kind: 'parsedDate'; column: string; criterion: DateCriterion; encoding: DateEncoding };

export type FilterKind = Filter['kind'];

/** How loosely typed date input that fails to parse is treated. */
export type DateParsingMode = 'permissive' | 'strict';
