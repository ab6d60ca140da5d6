import type { AggregateCallNode, AggregateTarget, ExpressionNode } from '../../core/ast/expression-nodes.js';
import { caseWhen, inlineLiteral, neq } from '../../core/ast/expression-builders.js';
import { selectByDialect } from '../../core/dialect/dispatch.js';
import { AGGREGATE_FUNCTIONS } from '../../core/sql/sql.js';
import type { ExpressionBuilder } from '../expression-builder.js';
import { AggregateExpression } from './aggregate-expression.js';

/**
 * Shared shape of the bit/bool families: where the engine has no native
 * function, fold the argument to 1/0 and take MAX (any) or MIN (all).
 */
abstract class FlagAggregateExpression extends AggregateExpression {
  protected fold(call: AggregateCallNode, name: 'MAX' | 'MIN', condition: ExpressionNode): AggregateCallNode {
    return {
      ...call,
      name,
      args: [caseWhen([{ when: condition, then: inlineLiteral(1) }], inlineLiteral(0))],
      valueIndex: 0
    };
  }
}

abstract class BitAggregateExpression extends FlagAggregateExpression {
  protected abstract readonly fallback: 'MAX' | 'MIN';

  protected rewrite(call: AggregateCallNode, target: AggregateTarget): AggregateCallNode {
    return selectByDialect<AggregateCallNode>(target, {
      postgres: () => call,
      mysql: () => call,
      sqlite: () => this.fold(call, this.fallback, neq(call.args[call.valueIndex], inlineLiteral(0)))
    }, this.functionName);
  }
}

abstract class BoolAggregateExpression extends FlagAggregateExpression {
  protected abstract readonly fallback: 'MAX' | 'MIN';

  protected rewrite(call: AggregateCallNode, target: AggregateTarget): AggregateCallNode {
    const emulate = () => this.fold(call, this.fallback, call.args[call.valueIndex]);
    return selectByDialect<AggregateCallNode>(target, {
      postgres: () => call,
      mysql: emulate,
      sqlite: emulate
    }, this.functionName);
  }
}

/**
 * BIT_OR; SQLite reports whether any value is non-zero
 */
export class BitOrExpression extends BitAggregateExpression {
  protected readonly fallback = 'MAX';

  constructor(scope: ExpressionBuilder) {
    super(scope, AGGREGATE_FUNCTIONS.BIT_OR);
  }
}

/**
 * BIT_AND; SQLite reports whether every value is non-zero
 */
export class BitAndExpression extends BitAggregateExpression {
  protected readonly fallback = 'MIN';

  constructor(scope: ExpressionBuilder) {
    super(scope, AGGREGATE_FUNCTIONS.BIT_AND);
  }
}

export class BoolOrExpression extends BoolAggregateExpression {
  protected readonly fallback = 'MAX';

  constructor(scope: ExpressionBuilder) {
    super(scope, AGGREGATE_FUNCTIONS.BOOL_OR);
  }
}

export class BoolAndExpression extends BoolAggregateExpression {
  protected readonly fallback = 'MIN';

  constructor(scope: ExpressionBuilder) {
    super(scope, AGGREGATE_FUNCTIONS.BOOL_AND);
  }
}
