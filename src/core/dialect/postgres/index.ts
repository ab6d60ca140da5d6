import { SqlDialectBase } from '../base/sql-dialect.js';
import type { DialectOptions } from '../dialect-options.js';

/**
 * PostgreSQL dialect implementation
 */
export class PostgresDialect extends SqlDialectBase {
  public readonly dialect = 'postgres';
  protected readonly identifierQuote = '"';

  /**
   * Creates a new PostgresDialect instance
   */
  public constructor(options?: DialectOptions) {
    super(options);
  }

  /**
   * Formats parameter placeholders using PostgreSQL positional syntax
   * @param index - Parameter index
   * @returns Positional placeholder ($1, $2, ...)
   */
  protected formatPlaceholder(index: number): string {
    return `$${index}`;
  }
}
