import { MySqlDialect } from '../../src/core/dialect/mysql/index.js';
import { PostgresDialect } from '../../src/core/dialect/postgres/index.js';
import { SqliteDialect } from '../../src/core/dialect/sqlite/index.js';
import type { DialectOptions } from '../../src/core/dialect/dialect-options.js';

/**
 * Unquoted identifiers and inline literals, so expected SQL reads like hand-written SQL.
 */
export const plain: DialectOptions = { quoteIdentifiers: false, inlineLiterals: true };

export const plainDialects = (options: DialectOptions = {}) => ({
  postgres: new PostgresDialect({ ...plain, ...options }),
  mysql: new MySqlDialect({ ...plain, ...options }),
  sqlite: new SqliteDialect({ ...plain, ...options }),
});

export const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
};
