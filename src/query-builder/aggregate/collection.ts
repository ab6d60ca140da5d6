import type { AggregateCallNode, AggregateTarget, OperandNode } from '../../core/ast/expression-nodes.js';
import { valueToOperand, type ValueOperandInput } from '../../core/ast/expression-builders.js';
import { selectByDialect } from '../../core/dialect/dispatch.js';
import { MissingArgumentsError } from '../../core/errors.js';
import { AGGREGATE_FUNCTIONS } from '../../core/sql/sql.js';
import type { ExpressionBuilder } from '../expression-builder.js';
import { AggregateExpression } from './aggregate-expression.js';
import { Distinctable, NullHandling, Orderable } from './capabilities.js';

/**
 * Collects values into an array: ARRAY_AGG on postgres, a JSON array elsewhere.
 * MySQL and SQLite drop DISTINCT and ORDER BY.
 */
export class ArrayAggExpression extends NullHandling(Orderable(Distinctable(AggregateExpression))) {
  constructor(scope: ExpressionBuilder) {
    super(scope, AGGREGATE_FUNCTIONS.ARRAY_AGG);
  }

  protected rewrite(call: AggregateCallNode, target: AggregateTarget): AggregateCallNode {
    const base = this.emulateNullHandling(call);
    return selectByDialect<AggregateCallNode>(target, {
      postgres: () => ({ ...base, name: 'ARRAY_AGG' }),
      mysql: () => this.withoutOrdering({ ...base, name: 'JSON_ARRAYAGG' }, target),
      sqlite: () => this.withoutOrdering({ ...base, name: 'JSON_GROUP_ARRAY' }, target)
    }, this.functionName);
  }
}

/**
 * Builds a JSON object from key/value pairs. Requires both a value and a key.
 */
export class JsonObjectAggExpression extends Orderable(Distinctable(AggregateExpression)) {
  private keyExpression?: OperandNode;

  constructor(scope: ExpressionBuilder) {
    super(scope, AGGREGATE_FUNCTIONS.JSON_OBJECT_AGG);
  }

  keyColumn(name: string): this {
    this.keyExpression = this.scope.column(name);
    return this;
  }

  keyExpr(expression: ValueOperandInput): this {
    this.keyExpression = valueToOperand(expression);
    return this;
  }

  protected buildCall(argument: OperandNode, target: AggregateTarget): AggregateCallNode {
    if (!this.keyExpression) {
      throw new MissingArgumentsError(this.functionName, target.dialect, 'requires a key column or expression');
    }
    const call = super.buildCall(argument, target);
    return { ...call, args: [this.keyExpression, argument], valueIndex: 1 };
  }

  protected rewrite(call: AggregateCallNode, target: AggregateTarget): AggregateCallNode {
    return selectByDialect<AggregateCallNode>(target, {
      postgres: () => ({ ...call, name: 'JSON_OBJECT_AGG' }),
      mysql: () => this.withoutOrdering({ ...call, name: 'JSON_OBJECTAGG' }, target),
      sqlite: () => this.withoutOrdering({ ...call, name: 'JSON_GROUP_OBJECT' }, target)
    }, this.functionName);
  }
}

/**
 * Collects values into a JSON array.
 */
export class JsonArrayAggExpression extends Orderable(Distinctable(AggregateExpression)) {
  constructor(scope: ExpressionBuilder) {
    super(scope, AGGREGATE_FUNCTIONS.JSON_ARRAY_AGG);
  }

  protected rewrite(call: AggregateCallNode, target: AggregateTarget): AggregateCallNode {
    return selectByDialect<AggregateCallNode>(target, {
      postgres: () => ({ ...call, name: 'JSON_AGG' }),
      mysql: () => this.withoutOrdering({ ...call, name: 'JSON_ARRAYAGG' }, target),
      sqlite: () => this.withoutOrdering({ ...call, name: 'JSON_GROUP_ARRAY' }, target)
    }, this.functionName);
  }
}
