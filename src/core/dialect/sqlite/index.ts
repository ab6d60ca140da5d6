import { SqlDialectBase } from '../base/sql-dialect.js';
import type { DialectOptions } from '../dialect-options.js';

/**
 * SQLite dialect implementation
 */
export class SqliteDialect extends SqlDialectBase {
  public readonly dialect = 'sqlite';
  protected readonly identifierQuote = '"';

  /**
   * Creates a new SqliteDialect instance
   */
  public constructor(options?: DialectOptions) {
    // SQLite has no boolean literals
    super(options, { booleanTrue: '1', booleanFalse: '0' });
  }
}
