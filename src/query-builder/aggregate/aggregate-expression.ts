import type {
  AggregateCallNode,
  AggregateNode,
  AggregateSource,
  AggregateTarget,
  ExpressionNode,
  OperandNode,
  OrderByNode
} from '../../core/ast/expression-nodes.js';
import { caseWhen, isNotNull, valueToOperand, type ValueOperandInput } from '../../core/ast/expression-builders.js';
import type { CompiledQuery, Dialect } from '../../core/dialect/abstract.js';
import { MissingArgumentsError } from '../../core/errors.js';
import {
  NULLS_MODES,
  STATISTICAL_MODES,
  type AggregateFunctionName,
  type NullsMode,
  type StatisticalMode
} from '../../core/sql/sql.js';
import type { ExpressionBuilder } from '../expression-builder.js';

export const DEFAULT_SEPARATOR = ',';

/**
 * Dialect-agnostic configuration of one aggregate call.
 */
export interface AggregateState {
  functionName: AggregateFunctionName;
  argument?: OperandNode;
  distinct: boolean;
  filter?: ExpressionNode;
  orderBy: OrderByNode[];
  nullsMode: NullsMode;
  separator: string;
  statisticalMode: StatisticalMode;
}

export type FilterInput = ExpressionNode | ((eb: ExpressionBuilder) => ExpressionNode);

const nullsClause = (mode: NullsMode): AggregateCallNode['nulls'] => {
  switch (mode) {
    case NULLS_MODES.IGNORE:
      return 'IGNORE NULLS';
    case NULLS_MODES.RESPECT:
      return 'RESPECT NULLS';
    default:
      return undefined;
  }
};

/**
 * Base of every aggregate builder.
 *
 * Setters mutate the builder and return it for chaining. Compilation never
 * touches the state: {@link specialize} derives a fresh call node per dialect,
 * so one builder can be rendered any number of times, by any dialect.
 */
export abstract class AggregateExpression implements AggregateSource {
  protected readonly state: AggregateState;

  constructor(
    protected readonly scope: ExpressionBuilder,
    functionName: AggregateFunctionName
  ) {
    this.state = {
      functionName,
      distinct: false,
      orderBy: [],
      nullsMode: NULLS_MODES.DEFAULT,
      separator: DEFAULT_SEPARATOR,
      statisticalMode: STATISTICAL_MODES.DEFAULT
    };
  }

  get functionName(): AggregateFunctionName {
    return this.state.functionName;
  }

  /**
   * Aggregates a column; `alias.name` is taken as-is, a bare name is qualified with the builder's table alias
   */
  column(name: string): this {
    this.state.argument = this.scope.column(name);
    return this;
  }

  /**
   * Aggregates an arbitrary expression
   */
  expr(expression: ValueOperandInput): this {
    this.state.argument = valueToOperand(expression);
    return this;
  }

  /**
   * Restricts the rows fed to the aggregate (`FILTER (WHERE ...)`, emulated where unsupported)
   */
  filter(condition: FilterInput): this {
    this.state.filter = typeof condition === 'function' ? condition(this.scope) : condition;
    return this;
  }

  /**
   * Wraps the builder as an operand so it can sit inside other expressions
   */
  toOperand(): AggregateNode {
    return { type: 'Aggregate', source: this };
  }

  render(dialect: Dialect): CompiledQuery {
    return dialect.compileAggregate(this);
  }

  specialize(target: AggregateTarget): AggregateCallNode {
    const { argument, functionName } = this.state;
    if (!argument) {
      throw new MissingArgumentsError(functionName, target.dialect);
    }
    return this.rewrite(this.buildCall(argument, target), target);
  }

  protected buildCall(argument: OperandNode, _target: AggregateTarget): AggregateCallNode {
    void _target;
    const { functionName, distinct, orderBy, nullsMode, filter } = this.state;
    const call: AggregateCallNode = {
      type: 'AggregateCall',
      name: functionName,
      args: [argument],
      valueIndex: 0,
      distinct,
      orderBy: [...orderBy],
      filter
    };
    const nulls = nullsClause(nullsMode);
    if (nulls) {
      call.nulls = nulls;
    }
    return call;
  }

  /**
   * Dialect-specific rewrite of the neutral call; identity unless a family overrides it
   */
  protected rewrite(call: AggregateCallNode, _target: AggregateTarget): AggregateCallNode {
    void _target;
    return call;
  }

  /**
   * IGNORE NULLS as `CASE WHEN arg IS NOT NULL THEN arg END`; RESPECT NULLS is the default and emits nothing
   */
  protected emulateNullHandling(call: AggregateCallNode): AggregateCallNode {
    const { nulls: _nulls, ...rest } = call;
    void _nulls;
    if (this.state.nullsMode !== NULLS_MODES.IGNORE) {
      return rest;
    }
    const args = rest.args.map((arg, index) =>
      index === rest.valueIndex ? caseWhen([{ when: isNotNull(arg), then: arg }]) : arg
    );
    return { ...rest, args };
  }

  /**
   * Drops DISTINCT and ORDER BY for engines whose equivalent function takes neither
   */
  protected withoutOrdering(call: AggregateCallNode, target: AggregateTarget): AggregateCallNode {
    if (call.distinct || call.orderBy.length > 0) {
      target.notice(
        this.state.functionName,
        `DISTINCT and ORDER BY are not supported by ${call.name} and were dropped`
      );
    }
    return { ...call, distinct: false, orderBy: [] };
  }
}
