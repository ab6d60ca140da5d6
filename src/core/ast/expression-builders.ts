import { SqlOperator } from '../sql/sql.js';
import { ColumnRef } from './types.js';
import {
  ColumnNode,
  FunctionNode,
  LiteralNode,
  LiteralValue,
  OperandNode,
  CaseExpressionNode,
  BinaryExpressionNode,
  ExpressionNode,
  LogicalExpressionNode,
  NullExpressionNode,
  InExpressionNode,
  BetweenExpressionNode,
  RawNode,
  ListNode,
  isOperandNode
} from './expression-nodes.js';

export type ValueOperandInput = OperandNode | LiteralValue;

const isLiteralValue = (value: unknown): value is LiteralValue =>
  value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';

export const isValueOperandInput = (value: unknown): value is ValueOperandInput =>
  isOperandNode(value) || isLiteralValue(value);

/**
 * Converts a primitive or existing operand into an operand node
 * @param value - Value or operand to normalize
 * @returns OperandNode representing the value
 */
export const valueToOperand = (value: ValueOperandInput): OperandNode => {
  if (isLiteralValue(value)) {
    return { type: 'Literal', value };
  }
  return value;
};

/**
 * Literal rendered in place, never bound as a parameter
 */
export const inlineLiteral = (value: LiteralValue): LiteralNode => ({
  type: 'Literal',
  value,
  inline: true
});

/**
 * The `*` argument of COUNT(*)
 */
export const STAR: RawNode = { type: 'Raw', sql: '*', args: [] };

export const isStar = (node: OperandNode): boolean =>
  node.type === 'Raw' && node.sql === '*' && node.args.length === 0;

const toNode = (col: ColumnRef | OperandNode): OperandNode => {
  if (isOperandNode(col)) return col;
  return col.table ? { type: 'Column', table: col.table, name: col.name } : { type: 'Column', name: col.name };
};

const toOperand = (val: OperandNode | ColumnRef | LiteralValue): OperandNode => {
  if (isLiteralValue(val)) {
    return valueToOperand(val);
  }

  return toNode(val);
};

export const columnOperand = (col: ColumnRef | ColumnNode): ColumnNode =>
  col.table ? { type: 'Column', table: col.table, name: col.name } : { type: 'Column', name: col.name };

const createBinaryExpression = (
  operator: SqlOperator,
  left: OperandNode | ColumnRef,
  right: OperandNode | ColumnRef | LiteralValue,
  escape?: string
): BinaryExpressionNode => {
  const node: BinaryExpressionNode = {
    type: 'BinaryExpression',
    left: toNode(left),
    operator,
    right: toOperand(right)
  };

  if (escape !== undefined) {
    node.escape = { type: 'Literal', value: escape };
  }

  return node;
};

/**
 * Creates an equality expression (left = right)
 * @param left - Left operand
 * @param right - Right operand
 * @returns Binary expression node with equality operator
 */
export const eq = (left: OperandNode | ColumnRef, right: OperandNode | ColumnRef | string | number | boolean): BinaryExpressionNode =>
  createBinaryExpression('=', left, right);

/**
 * Creates a not equal expression (left != right)
 */
export const neq = (
  left: OperandNode | ColumnRef,
  right: OperandNode | ColumnRef | string | number | boolean
): BinaryExpressionNode => createBinaryExpression('!=', left, right);

/**
 * Creates a greater-than expression (left > right)
 */
export const gt = (left: OperandNode | ColumnRef, right: OperandNode | ColumnRef | string | number): BinaryExpressionNode =>
  createBinaryExpression('>', left, right);

/**
 * Creates a greater than or equal expression (left >= right)
 */
export const gte = (left: OperandNode | ColumnRef, right: OperandNode | ColumnRef | string | number): BinaryExpressionNode =>
  createBinaryExpression('>=', left, right);

/**
 * Creates a less-than expression (left < right)
 */
export const lt = (left: OperandNode | ColumnRef, right: OperandNode | ColumnRef | string | number): BinaryExpressionNode =>
  createBinaryExpression('<', left, right);

/**
 * Creates a less than or equal expression (left <= right)
 */
export const lte = (left: OperandNode | ColumnRef, right: OperandNode | ColumnRef | string | number): BinaryExpressionNode =>
  createBinaryExpression('<=', left, right);

/**
 * Creates a LIKE pattern matching expression
 * @param left - Left operand
 * @param pattern - Pattern to match
 * @param escape - Optional escape character
 */
export const like = (left: OperandNode | ColumnRef, pattern: string, escape?: string): BinaryExpressionNode =>
  createBinaryExpression('LIKE', left, pattern, escape);

/**
 * Creates a NOT LIKE pattern matching expression
 */
export const notLike = (left: OperandNode | ColumnRef, pattern: string, escape?: string): BinaryExpressionNode =>
  createBinaryExpression('NOT LIKE', left, pattern, escape);

/**
 * Creates a logical AND expression
 * @param expressions - Expressions to combine with AND
 */
export const and = (...expressions: ExpressionNode[]): LogicalExpressionNode => ({
  type: 'LogicalExpression',
  operator: 'AND',
  operands: expressions
});

/**
 * Creates a logical OR expression
 * @param expressions - Expressions to combine with OR
 */
export const or = (...expressions: ExpressionNode[]): LogicalExpressionNode => ({
  type: 'LogicalExpression',
  operator: 'OR',
  operands: expressions
});

/**
 * True for an AND/OR with no operands, directly or through nesting; it renders to nothing
 */
export const isEmptyCondition = (node: ExpressionNode): boolean =>
  node.type === 'LogicalExpression' && node.operands.every(isEmptyCondition);

/**
 * Creates an IS NULL expression
 */
export const isNull = (left: OperandNode | ColumnRef): NullExpressionNode => ({
  type: 'NullExpression',
  left: toNode(left),
  operator: 'IS NULL'
});

/**
 * Creates an IS NOT NULL expression
 */
export const isNotNull = (left: OperandNode | ColumnRef): NullExpressionNode => ({
  type: 'NullExpression',
  left: toNode(left),
  operator: 'IS NOT NULL'
});

const createInExpression = (
  operator: 'IN' | 'NOT IN',
  left: OperandNode | ColumnRef,
  values: (string | number | LiteralNode)[]
): InExpressionNode => ({
  type: 'InExpression',
  left: toNode(left),
  operator,
  right: values.map(v => toOperand(v))
});

/**
 * Creates an IN expression (value IN list)
 */
export const inList = (left: OperandNode | ColumnRef, values: (string | number | LiteralNode)[]): InExpressionNode =>
  createInExpression('IN', left, values);

/**
 * Creates a NOT IN expression (value NOT IN list)
 */
export const notInList = (left: OperandNode | ColumnRef, values: (string | number | LiteralNode)[]): InExpressionNode =>
  createInExpression('NOT IN', left, values);

const createBetweenExpression = (
  operator: 'BETWEEN' | 'NOT BETWEEN',
  left: OperandNode | ColumnRef,
  lower: OperandNode | ColumnRef | string | number,
  upper: OperandNode | ColumnRef | string | number
): BetweenExpressionNode => ({
  type: 'BetweenExpression',
  left: toNode(left),
  operator,
  lower: toOperand(lower),
  upper: toOperand(upper)
});

/**
 * Creates a BETWEEN expression (value BETWEEN lower AND upper)
 */
export const between = (
  left: OperandNode | ColumnRef,
  lower: OperandNode | ColumnRef | string | number,
  upper: OperandNode | ColumnRef | string | number
): BetweenExpressionNode => createBetweenExpression('BETWEEN', left, lower, upper);

/**
 * Creates a NOT BETWEEN expression
 */
export const notBetween = (
  left: OperandNode | ColumnRef,
  lower: OperandNode | ColumnRef | string | number,
  upper: OperandNode | ColumnRef | string | number
): BetweenExpressionNode => createBetweenExpression('NOT BETWEEN', left, lower, upper);

/**
 * Creates a CASE expression
 * @param conditions - Array of WHEN-THEN conditions
 * @param elseValue - Optional ELSE value
 * @returns CaseExpressionNode
 */
export const caseWhen = (
  conditions: { when: ExpressionNode; then: ValueOperandInput }[],
  elseValue?: ValueOperandInput
): CaseExpressionNode => {
  const node: CaseExpressionNode = {
    type: 'CaseExpression',
    conditions: conditions.map(c => ({
      when: c.when,
      then: valueToOperand(c.then)
    }))
  };
  if (elseValue !== undefined) {
    node.else = valueToOperand(elseValue);
  }
  return node;
};

/**
 * Creates a raw SQL fragment; `?` placeholders take the given arguments in order
 */
export const raw = (sql: string, ...args: ValueOperandInput[]): RawNode => ({
  type: 'Raw',
  sql,
  args: args.map(valueToOperand)
});

/**
 * Joins operands with a separator (`, ` by default)
 */
export const list = (items: ValueOperandInput[], separator = ', '): ListNode => ({
  type: 'List',
  items: items.map(valueToOperand),
  separator
});

/**
 * Creates a plain function call
 */
export const fn = (name: string, ...args: ValueOperandInput[]): FunctionNode => ({
  type: 'Function',
  name,
  args: args.map(valueToOperand)
});
