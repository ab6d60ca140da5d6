import type { AggregateCallNode, AggregateTarget } from '../../core/ast/expression-nodes.js';
import { inlineLiteral } from '../../core/ast/expression-builders.js';
import { selectByDialect } from '../../core/dialect/dispatch.js';
import { AGGREGATE_FUNCTIONS } from '../../core/sql/sql.js';
import type { ExpressionBuilder } from '../expression-builder.js';
import { AggregateExpression, DEFAULT_SEPARATOR } from './aggregate-expression.js';
import { Distinctable, NullHandling, Orderable } from './capabilities.js';

/**
 * Concatenates values with a separator.
 *
 * - postgres: `STRING_AGG(arg, 'sep' [ORDER BY ...])`
 * - mysql: `GROUP_CONCAT([DISTINCT] arg [ORDER BY ...] SEPARATOR 'sep')`
 * - sqlite: `GROUP_CONCAT(arg, 'sep')`, or `GROUP_CONCAT(DISTINCT arg)` since
 *   SQLite rejects a separator next to DISTINCT
 */
export class StringAggExpression extends NullHandling(Orderable(Distinctable(AggregateExpression))) {
  constructor(scope: ExpressionBuilder) {
    super(scope, AGGREGATE_FUNCTIONS.STRING_AGG);
  }

  /**
   * Separator placed between values (default `,`); always rendered as an inline literal
   */
  separator(separator: string): this {
    this.state.separator = separator;
    return this;
  }

  protected rewrite(call: AggregateCallNode, target: AggregateTarget): AggregateCallNode {
    const base = this.emulateNullHandling(call);
    const value = base.args[base.valueIndex];
    const { separator } = this.state;

    return selectByDialect<AggregateCallNode>(target, {
      postgres: () => ({ ...base, name: 'STRING_AGG', args: [value, inlineLiteral(separator)] }),
      mysql: () => ({ ...base, name: 'GROUP_CONCAT', separator }),
      sqlite: () => {
        if (!base.distinct) {
          return { ...base, name: 'GROUP_CONCAT', args: [value, inlineLiteral(separator)] };
        }
        if (separator !== DEFAULT_SEPARATOR) {
          target.notice(this.functionName, `GROUP_CONCAT(DISTINCT ...) takes no separator; "${separator}" was dropped`);
        }
        return { ...base, name: 'GROUP_CONCAT' };
      }
    }, this.functionName);
  }
}
