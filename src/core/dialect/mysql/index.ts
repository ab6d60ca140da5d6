import type { CompilerContext } from '../abstract.js';
import type { OrderByNode } from '../../ast/expression-nodes.js';
import { escapeSqlString } from '../../sql/literal-formatter.js';
import { SqlDialectBase } from '../base/sql-dialect.js';
import { OrderByCompiler } from '../base/orderby-compiler.js';
import type { DialectOptions } from '../dialect-options.js';

/**
 * MySQL dialect implementation
 */
export class MySqlDialect extends SqlDialectBase {
  public readonly dialect = 'mysql';
  protected readonly identifierQuote = '`';

  /**
   * Creates a new MySqlDialect instance
   */
  public constructor(options?: DialectOptions) {
    super(options, {
      // backslash is an escape character inside MySQL string literals
      stringEscaper: value => escapeSqlString(value.replace(/\\/g, '\\\\'))
    });
  }

  /**
   * MySQL has no aggregate FILTER clause; filters are folded into CASE.
   */
  supportsAggregateFilter(): boolean {
    return false;
  }

  /**
   * MySQL has no NULLS FIRST/LAST; the placement becomes a leading `term IS NULL` key.
   */
  protected compileOrderBy(orderBy: OrderByNode[], ctx: CompilerContext): string {
    return super.compileOrderBy(OrderByCompiler.expandNullsOrdering(orderBy), ctx);
  }
}
