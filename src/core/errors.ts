import type { DialectKey } from './sql/sql.js';

export const AGGREGATE_ERROR_CODES = {
  MISSING_ARGUMENTS: 'MISSING_ARGUMENTS',
  DIALECT_UNSUPPORTED_OPERATION: 'DIALECT_UNSUPPORTED_OPERATION',
  AGGREGATE_UNSUPPORTED_FUNCTION: 'AGGREGATE_UNSUPPORTED_FUNCTION'
} as const;

export type AggregateErrorCode = (typeof AGGREGATE_ERROR_CODES)[keyof typeof AGGREGATE_ERROR_CODES];

/**
 * Base class for errors raised while compiling an aggregate expression.
 */
export class AggregateCompileError extends Error {
  constructor(
    message: string,
    public readonly code: AggregateErrorCode,
    public readonly fn?: string,
    public readonly dialect?: DialectKey
  ) {
    super(message);
    this.name = 'AggregateCompileError';
  }
}

/**
 * Raised when an aggregate is rendered before its argument (or JSON key) was set.
 */
export class MissingArgumentsError extends AggregateCompileError {
  constructor(fn: string, dialect?: DialectKey, detail = 'requires a column or expression argument') {
    super(`${fn} ${detail}`, AGGREGATE_ERROR_CODES.MISSING_ARGUMENTS, fn, dialect);
    this.name = 'MissingArgumentsError';
  }
}

/**
 * Raised when a dialect-dispatched operation has no handler for the active dialect.
 */
export class DialectUnsupportedOperationError extends AggregateCompileError {
  constructor(operation: string, dialect: DialectKey) {
    super(
      `${operation} is not supported for dialect "${dialect}"`,
      AGGREGATE_ERROR_CODES.DIALECT_UNSUPPORTED_OPERATION,
      operation,
      dialect
    );
    this.name = 'DialectUnsupportedOperationError';
  }
}

/**
 * Raised when a dialect has no equivalent for an aggregate family.
 */
export class AggregateUnsupportedFunctionError extends AggregateCompileError {
  constructor(fn: string, dialect: DialectKey) {
    super(
      `${fn} is not supported by dialect "${dialect}"`,
      AGGREGATE_ERROR_CODES.AGGREGATE_UNSUPPORTED_FUNCTION,
      fn,
      dialect
    );
    this.name = 'AggregateUnsupportedFunctionError';
  }
}
