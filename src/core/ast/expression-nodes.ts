import type { DialectBranch, DialectKey, NullsOrdering, OrderDirection, SqlOperator } from '../sql/sql.js';

export type LiteralValue = string | number | boolean | null;

/**
 * AST node representing a literal value
 */
export interface LiteralNode {
  type: 'Literal';
  /** The literal value (string, number, boolean, or null) */
  value: LiteralValue;
  /** Always render in place instead of binding a parameter */
  inline?: boolean;
}

/**
 * AST node representing a column reference
 */
export interface ColumnNode {
  type: 'Column';
  /** Table or alias the column belongs to; unqualified when absent */
  table?: string;
  /** Column name */
  name: string;
}

/**
 * AST node representing a raw SQL fragment.
 * Each `?` in `sql` is replaced by the compiled operand at the same position in `args`.
 */
export interface RawNode {
  type: 'Raw';
  sql: string;
  args: OperandNode[];
}

/**
 * AST node representing a separated list of operands (e.g. `a, b, c`)
 */
export interface ListNode {
  type: 'List';
  items: OperandNode[];
  separator: string;
}

/**
 * AST node representing a function call
 */
export interface FunctionNode {
  type: 'Function';
  /** Function name (e.g., COALESCE, LOWER) */
  name: string;
  /** Function arguments */
  args: OperandNode[];
}

/**
 * AST node representing a CASE expression
 */
export interface CaseExpressionNode {
  type: 'CaseExpression';
  /** WHEN-THEN conditions; a bare operand as condition tests its truthiness */
  conditions: { when: ExpressionNode; then: OperandNode }[];
  /** Optional ELSE clause */
  else?: OperandNode;
}

/**
 * AST node representing an ordering term inside an aggregate
 */
export interface OrderByNode {
  type: 'OrderBy';
  term: ExpressionNode;
  direction: OrderDirection;
  nulls?: NullsOrdering;
}

/**
 * Fully resolved aggregate call, already specialized for one dialect.
 */
export interface AggregateCallNode {
  type: 'AggregateCall';
  /** Function name as it will be emitted */
  name: string;
  args: OperandNode[];
  /** Index in `args` of the aggregated value; FILTER emulation wraps this argument */
  valueIndex: number;
  distinct: boolean;
  orderBy: OrderByNode[];
  /** MySQL-style `SEPARATOR '...'` clause, rendered inside the parentheses */
  separator?: string;
  nulls?: 'IGNORE NULLS' | 'RESPECT NULLS';
  filter?: ExpressionNode;
}

/**
 * Compile-time view of the dialect handed to aggregate sources.
 */
export interface AggregateTarget {
  readonly dialect: DialectKey;
  /** Reports a capability the dialect silently dropped */
  notice(fn: string, message: string): void;
}

/**
 * Anything able to produce a dialect-specialized aggregate call.
 */
export interface AggregateSource {
  specialize(target: AggregateTarget): AggregateCallNode;
}

/**
 * AST node embedding an aggregate builder into an expression tree.
 * The builder is specialized when the dialect compiles the node.
 */
export interface AggregateNode {
  type: 'Aggregate';
  source: AggregateSource;
}

/**
 * AST node whose operand is picked by dialect at compile time; renders NULL when no branch matches.
 */
export interface DialectExpressionNode {
  type: 'DialectExpression';
  branches: Partial<Record<DialectBranch, OperandNode>>;
}

/**
 * Union type representing any operand that can be used in expressions
 */
export type OperandNode =
  | ColumnNode
  | LiteralNode
  | RawNode
  | ListNode
  | FunctionNode
  | CaseExpressionNode
  | AggregateNode
  | AggregateCallNode
  | DialectExpressionNode;

const operandTypes = new Set<string>([
  'Column',
  'Literal',
  'Raw',
  'List',
  'Function',
  'CaseExpression',
  'Aggregate',
  'AggregateCall',
  'DialectExpression'
]);

const hasNodeType = (node: unknown): node is { type: unknown } =>
  typeof node === 'object' && node !== null && 'type' in node;

export const isOperandNode = (node: unknown): node is OperandNode =>
  hasNodeType(node) && typeof node.type === 'string' && operandTypes.has(node.type);

export const isAggregateSource = (value: unknown): value is AggregateSource =>
  typeof value === 'object' &&
  value !== null &&
  'specialize' in value &&
  typeof value.specialize === 'function';

/**
 * AST node representing a binary expression (e.g., column = value)
 */
export interface BinaryExpressionNode {
  type: 'BinaryExpression';
  /** Left operand */
  left: OperandNode;
  /** Comparison operator */
  operator: SqlOperator;
  /** Right operand */
  right: OperandNode;
  /** Optional escape character for LIKE expressions */
  escape?: LiteralNode;
}

/**
 * AST node representing a logical expression (AND/OR)
 */
export interface LogicalExpressionNode {
  type: 'LogicalExpression';
  /** Logical operator (AND or OR) */
  operator: 'AND' | 'OR';
  /** Operands to combine */
  operands: ExpressionNode[];
}

/**
 * AST node representing a null check expression
 */
export interface NullExpressionNode {
  type: 'NullExpression';
  /** Operand to check for null */
  left: OperandNode;
  /** Null check operator */
  operator: 'IS NULL' | 'IS NOT NULL';
}

/**
 * AST node representing an IN/NOT IN expression
 */
export interface InExpressionNode {
  type: 'InExpression';
  /** Left operand to check */
  left: OperandNode;
  /** IN/NOT IN operator */
  operator: 'IN' | 'NOT IN';
  /** Values to check against */
  right: OperandNode[];
}

/**
 * AST node representing a BETWEEN/NOT BETWEEN expression
 */
export interface BetweenExpressionNode {
  type: 'BetweenExpression';
  /** Operand to check */
  left: OperandNode;
  /** BETWEEN/NOT BETWEEN operator */
  operator: 'BETWEEN' | 'NOT BETWEEN';
  /** Lower bound */
  lower: OperandNode;
  /** Upper bound */
  upper: OperandNode;
}

/**
 * Union type representing any supported expression node.
 * Operands are accepted as boolean conditions (a raw predicate, a boolean column).
 */
export type ExpressionNode =
  | OperandNode
  | BinaryExpressionNode
  | LogicalExpressionNode
  | NullExpressionNode
  | InExpressionNode
  | BetweenExpressionNode;
