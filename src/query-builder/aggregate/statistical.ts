import type { AggregateCallNode, AggregateTarget } from '../../core/ast/expression-nodes.js';
import { selectByDialect } from '../../core/dialect/dispatch.js';
import { AggregateUnsupportedFunctionError } from '../../core/errors.js';
import { AGGREGATE_FUNCTIONS, STATISTICAL_MODES } from '../../core/sql/sql.js';
import type { ExpressionBuilder } from '../expression-builder.js';
import { AggregateExpression } from './aggregate-expression.js';
import { Statistical } from './capabilities.js';

abstract class StatisticalAggregateExpression extends Statistical(AggregateExpression) {
  protected abstract readonly variants: { POP: string; SAMP: string };

  /**
   * postgres defaults to the population variant; mysql keeps its plain
   * function unless a mode was chosen; sqlite has neither.
   */
  protected rewrite(call: AggregateCallNode, target: AggregateTarget): AggregateCallNode {
    const mode = this.state.statisticalMode;
    return selectByDialect<AggregateCallNode>(target, {
      postgres: () => ({
        ...call,
        name: mode === STATISTICAL_MODES.SAMP ? this.variants.SAMP : this.variants.POP
      }),
      mysql: () => (mode === STATISTICAL_MODES.DEFAULT ? call : { ...call, name: this.variants[mode] }),
      sqlite: () => {
        throw new AggregateUnsupportedFunctionError(this.functionName, target.dialect);
      }
    }, this.functionName);
  }
}

export class StdDevExpression extends StatisticalAggregateExpression {
  protected readonly variants = { POP: 'STDDEV_POP', SAMP: 'STDDEV_SAMP' };

  constructor(scope: ExpressionBuilder) {
    super(scope, AGGREGATE_FUNCTIONS.STDDEV);
  }
}

export class VarianceExpression extends StatisticalAggregateExpression {
  protected readonly variants = { POP: 'VAR_POP', SAMP: 'VAR_SAMP' };

  constructor(scope: ExpressionBuilder) {
    super(scope, AGGREGATE_FUNCTIONS.VARIANCE);
  }
}
