import type { LiteralValue } from '../ast/expression-nodes.js';

/**
 * Escape a value to be safe inside a single-quoted SQL literal.
 * Purely mechanical; no dialect knowledge.
 */
export const escapeSqlString = (value: string): string =>
  value.replace(/'/g, "''");

/**
 * Abstraction for "how do I turn values into SQL literals".
 * Implemented or configured by each dialect.
 */
export interface LiteralFormatter {
  formatLiteral(value: LiteralValue): string;
}

/**
 * Declarative options for building a LiteralFormatter.
 * Dialects configure behavior by data, not by being hard-coded here.
 */
export interface LiteralFormatOptions {
  nullLiteral?: string; // default: 'NULL'
  booleanTrue?: string; // default: 'TRUE'
  booleanFalse?: string; // default: 'FALSE'

  numberFormatter?: (value: number) => string;
  stringEscaper?: (value: string) => string;
  stringWrapper?: (escaped: string) => string;
}

/**
 * Builds a value-based LiteralFormatter that dispatches on the value type
 * and delegates representation choices to options.
 */
export const createLiteralFormatter = (
  options: LiteralFormatOptions = {}
): LiteralFormatter => {
  const {
    nullLiteral = 'NULL',
    booleanTrue = 'TRUE',
    booleanFalse = 'FALSE',

    numberFormatter = (value: number): string =>
      Number.isFinite(value) ? String(value) : nullLiteral,

    stringEscaper = escapeSqlString,
    stringWrapper = (escaped: string): string => `'${escaped}'`,
  } = options;

  const format = (value: LiteralValue): string => {
    if (value === null) return nullLiteral;

    if (typeof value === 'number') {
      return numberFormatter(value);
    }

    if (typeof value === 'boolean') {
      return value ? booleanTrue : booleanFalse;
    }

    return stringWrapper(stringEscaper(value));
  };

  return {
    formatLiteral: format,
  };
};
