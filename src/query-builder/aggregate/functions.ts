import type { ColumnNode } from '../../core/ast/expression-nodes.js';
import { columnOperand } from '../../core/ast/expression-builders.js';
import type { ColumnRef } from '../../core/ast/types.js';
import { ExpressionBuilder } from '../expression-builder.js';
import type { AggregateExpression } from './aggregate-expression.js';
import type { CountExpression } from './basic.js';

/**
 * Column input for the standalone helpers: a name (`title`, `p.title`) or a column reference
 */
export type AggregateColumnInput = string | ColumnRef | ColumnNode;

const unbound = new ExpressionBuilder();

const withColumn = <T extends AggregateExpression>(builder: T, col: AggregateColumnInput): T =>
  typeof col === 'string' ? builder.column(col) : builder.expr(columnOperand(col));

/**
 * Creates a COUNT aggregate over a column
 * @param col - Column to count
 */
export const count = (col: AggregateColumnInput): CountExpression => withColumn(unbound.count(), col);

/**
 * Creates a COUNT(*) aggregate
 */
export const countAll = (): CountExpression => unbound.countAll();

/**
 * Creates a SUM aggregate
 * @param col - Column to sum
 */
export const sum = (col: AggregateColumnInput) => withColumn(unbound.sum(), col);

/**
 * Creates an AVG aggregate
 * @param col - Column to average
 */
export const avg = (col: AggregateColumnInput) => withColumn(unbound.avg(), col);

/**
 * Creates a MIN aggregate
 */
export const min = (col: AggregateColumnInput) => withColumn(unbound.min(), col);

/**
 * Creates a MAX aggregate
 */
export const max = (col: AggregateColumnInput) => withColumn(unbound.max(), col);

/**
 * Concatenates grouped strings with a separator (default `,`)
 */
export const stringAgg = (col: AggregateColumnInput, separator?: string) => {
  const builder = withColumn(unbound.stringAgg(), col);
  return separator === undefined ? builder : builder.separator(separator);
};

export const arrayAgg = (col: AggregateColumnInput) => withColumn(unbound.arrayAgg(), col);

/**
 * Builds a JSON object keyed by `key` with values from `value`
 */
export const jsonObjectAgg = (key: AggregateColumnInput, value: AggregateColumnInput) => {
  const builder = withColumn(unbound.jsonObjectAgg(), value);
  return typeof key === 'string' ? builder.keyColumn(key) : builder.keyExpr(columnOperand(key));
};

export const jsonArrayAgg = (col: AggregateColumnInput) => withColumn(unbound.jsonArrayAgg(), col);

export const bitOr = (col: AggregateColumnInput) => withColumn(unbound.bitOr(), col);

export const bitAnd = (col: AggregateColumnInput) => withColumn(unbound.bitAnd(), col);

export const boolOr = (col: AggregateColumnInput) => withColumn(unbound.boolOr(), col);

export const boolAnd = (col: AggregateColumnInput) => withColumn(unbound.boolAnd(), col);

/**
 * Standard deviation; population unless `.sample()` is chosen (dialect permitting)
 */
export const stddev = (col: AggregateColumnInput) => withColumn(unbound.stdDev(), col);

export const variance = (col: AggregateColumnInput) => withColumn(unbound.variance(), col);
