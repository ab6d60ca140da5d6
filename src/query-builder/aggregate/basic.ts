import { STAR } from '../../core/ast/expression-builders.js';
import { AGGREGATE_FUNCTIONS } from '../../core/sql/sql.js';
import type { ExpressionBuilder } from '../expression-builder.js';
import { AggregateExpression } from './aggregate-expression.js';
import { Distinctable } from './capabilities.js';

/**
 * COUNT; identical on every dialect apart from FILTER emulation.
 */
export class CountExpression extends Distinctable(AggregateExpression) {
  constructor(scope: ExpressionBuilder) {
    super(scope, AGGREGATE_FUNCTIONS.COUNT);
  }

  /**
   * Counts rows: COUNT(*)
   */
  all(): this {
    this.state.argument = STAR;
    return this;
  }
}

export class SumExpression extends Distinctable(AggregateExpression) {
  constructor(scope: ExpressionBuilder) {
    super(scope, AGGREGATE_FUNCTIONS.SUM);
  }
}

export class AvgExpression extends Distinctable(AggregateExpression) {
  constructor(scope: ExpressionBuilder) {
    super(scope, AGGREGATE_FUNCTIONS.AVG);
  }
}

export class MinExpression extends AggregateExpression {
  constructor(scope: ExpressionBuilder) {
    super(scope, AGGREGATE_FUNCTIONS.MIN);
  }
}

export class MaxExpression extends AggregateExpression {
  constructor(scope: ExpressionBuilder) {
    super(scope, AGGREGATE_FUNCTIONS.MAX);
  }
}
