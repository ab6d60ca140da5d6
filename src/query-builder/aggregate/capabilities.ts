import type { OperandNode } from '../../core/ast/expression-nodes.js';
import {
  NULLS_MODES,
  ORDER_DIRECTIONS,
  STATISTICAL_MODES,
  type NullsOrdering,
  type OrderDirection
} from '../../core/sql/sql.js';
import type { AggregateExpression } from './aggregate-expression.js';

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type AggregateConstructor<T = AggregateExpression> = abstract new (...args: any[]) => T;

/**
 * Adds `distinct()`.
 */
export function Distinctable<TBase extends AggregateConstructor>(Base: TBase) {
  abstract class DistinctableAggregate extends Base {
    /**
     * Aggregates distinct values only; calling it again has no further effect
     */
    distinct(): this {
      this.state.distinct = true;
      return this;
    }
  }
  return DistinctableAggregate;
}

/**
 * Adds ordering of the aggregated values. Terms are emitted in call order.
 */
export function Orderable<TBase extends AggregateConstructor>(Base: TBase) {
  abstract class OrderableAggregate extends Base {
    orderBy(...columns: string[]): this {
      for (const column of columns) {
        this.state.orderBy.push({ type: 'OrderBy', term: this.scope.column(column), direction: ORDER_DIRECTIONS.ASC });
      }
      return this;
    }

    orderByDesc(...columns: string[]): this {
      for (const column of columns) {
        this.state.orderBy.push({ type: 'OrderBy', term: this.scope.column(column), direction: ORDER_DIRECTIONS.DESC });
      }
      return this;
    }

    orderByExpr(expression: OperandNode, direction: OrderDirection = ORDER_DIRECTIONS.ASC, nulls?: NullsOrdering): this {
      this.state.orderBy.push(
        nulls
          ? { type: 'OrderBy', term: expression, direction, nulls }
          : { type: 'OrderBy', term: expression, direction }
      );
      return this;
    }
  }
  return OrderableAggregate;
}

/**
 * Adds IGNORE / RESPECT NULLS; the last call wins.
 */
export function NullHandling<TBase extends AggregateConstructor>(Base: TBase) {
  abstract class NullHandlingAggregate extends Base {
    ignoreNulls(): this {
      this.state.nullsMode = NULLS_MODES.IGNORE;
      return this;
    }

    respectNulls(): this {
      this.state.nullsMode = NULLS_MODES.RESPECT;
      return this;
    }
  }
  return NullHandlingAggregate;
}

/**
 * Adds population / sample selection; the last call wins, none means the dialect default.
 */
export function Statistical<TBase extends AggregateConstructor>(Base: TBase) {
  abstract class StatisticalAggregate extends Base {
    population(): this {
      this.state.statisticalMode = STATISTICAL_MODES.POP;
      return this;
    }

    sample(): this {
      this.state.statisticalMode = STATISTICAL_MODES.SAMP;
      return this;
    }
  }
  return StatisticalAggregate;
}
