import { Dialect } from '../abstract.js';
import type { DialectOptions } from '../dialect-options.js';
import { createLiteralFormatter, type LiteralFormatOptions } from '../../sql/literal-formatter.js';

/**
 * Shared compiler for the built-in dialects.
 * Concrete dialects override only the minimal hooks (identifier quote
 * character, literal spelling, placeholders, FILTER support) instead of
 * re-implementing the compile pipeline.
 */
export abstract class SqlDialectBase extends Dialect {
  /**
   * Character wrapping identifiers; embedded occurrences are doubled.
   */
  protected abstract readonly identifierQuote: string;

  protected constructor(options?: DialectOptions, literalOptions?: LiteralFormatOptions) {
    super(options, createLiteralFormatter(literalOptions));
  }

  protected wrapIdentifier(id: string): string {
    const quote = this.identifierQuote;
    return `${quote}${id.split(quote).join(quote + quote)}${quote}`;
  }
}
