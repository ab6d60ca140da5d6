/**
 * SQL operators used in query conditions
 */
export const SQL_OPERATORS = {
  /** Equality operator */
  EQUALS: '=',
  /** Not equals operator */
  NOT_EQUALS: '!=',
  /** Greater than operator */
  GREATER_THAN: '>',
  /** Greater than or equal operator */
  GREATER_OR_EQUAL: '>=',
  /** Less than operator */
  LESS_THAN: '<',
  /** Less than or equal operator */
  LESS_OR_EQUAL: '<=',
  /** LIKE pattern matching operator */
  LIKE: 'LIKE',
  /** NOT LIKE pattern matching operator */
  NOT_LIKE: 'NOT LIKE',
  /** IN membership operator */
  IN: 'IN',
  /** NOT IN membership operator */
  NOT_IN: 'NOT IN',
  /** BETWEEN range operator */
  BETWEEN: 'BETWEEN',
  /** NOT BETWEEN range operator */
  NOT_BETWEEN: 'NOT BETWEEN',
  /** IS NULL null check operator */
  IS_NULL: 'IS NULL',
  /** IS NOT NULL null check operator */
  IS_NOT_NULL: 'IS NOT NULL',
  /** Logical AND operator */
  AND: 'AND',
  /** Logical OR operator */
  OR: 'OR'
} as const;

/**
 * Type representing any supported SQL operator
 */
export type SqlOperator = (typeof SQL_OPERATORS)[keyof typeof SQL_OPERATORS];

/**
 * Ordering directions for result sorting
 */
export const ORDER_DIRECTIONS = {
  /** Ascending order */
  ASC: 'ASC',
  /** Descending order */
  DESC: 'DESC'
} as const;

/**
 * Type representing any supported order direction
 */
export type OrderDirection = (typeof ORDER_DIRECTIONS)[keyof typeof ORDER_DIRECTIONS];

/**
 * Placement of NULLs inside an ordering
 */
export const NULLS_ORDERING = {
  FIRST: 'FIRST',
  LAST: 'LAST'
} as const;

export type NullsOrdering = (typeof NULLS_ORDERING)[keyof typeof NULLS_ORDERING];

/**
 * Supported database dialects
 */
export const SUPPORTED_DIALECTS = {
  /** PostgreSQL database dialect */
  POSTGRES: 'postgres',
  /** MySQL database dialect */
  MYSQL: 'mysql',
  /** SQLite database dialect */
  SQLITE: 'sqlite'
} as const;

/**
 * Type representing any supported database dialect
 */
export type DialectName = (typeof SUPPORTED_DIALECTS)[keyof typeof SUPPORTED_DIALECTS];

/**
 * Dialect identifier; built-in names plus user-registered keys
 */
export type DialectKey = DialectName | (string & {});

/**
 * Handler slots of a dialect-keyed table: one per built-in dialect plus a fallback
 */
export type DialectBranch = DialectName | 'default';

/**
 * How an aggregate treats NULL inputs
 */
export const NULLS_MODES = {
  DEFAULT: 'DEFAULT',
  IGNORE: 'IGNORE',
  RESPECT: 'RESPECT'
} as const;

export type NullsMode = (typeof NULLS_MODES)[keyof typeof NULLS_MODES];

/**
 * Population or sample flavour of STDDEV / VARIANCE
 */
export const STATISTICAL_MODES = {
  DEFAULT: 'DEFAULT',
  POP: 'POP',
  SAMP: 'SAMP'
} as const;

export type StatisticalMode = (typeof STATISTICAL_MODES)[keyof typeof STATISTICAL_MODES];

/**
 * Canonical aggregate names used before dialect rewriting
 */
export const AGGREGATE_FUNCTIONS = {
  COUNT: 'COUNT',
  SUM: 'SUM',
  AVG: 'AVG',
  MIN: 'MIN',
  MAX: 'MAX',
  STRING_AGG: 'STRING_AGG',
  ARRAY_AGG: 'ARRAY_AGG',
  JSON_OBJECT_AGG: 'JSON_OBJECT_AGG',
  JSON_ARRAY_AGG: 'JSON_ARRAY_AGG',
  BIT_OR: 'BIT_OR',
  BIT_AND: 'BIT_AND',
  BOOL_OR: 'BOOL_OR',
  BOOL_AND: 'BOOL_AND',
  STDDEV: 'STDDEV',
  VARIANCE: 'VARIANCE'
} as const;

export type AggregateFunctionName = (typeof AGGREGATE_FUNCTIONS)[keyof typeof AGGREGATE_FUNCTIONS];
