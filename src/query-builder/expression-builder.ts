import type {
  CaseExpressionNode,
  ColumnNode,
  DialectExpressionNode,
  ExpressionNode,
  FunctionNode,
  ListNode,
  LiteralNode,
  LiteralValue,
  NullExpressionNode,
  OperandNode,
  RawNode
} from '../core/ast/expression-nodes.js';
import {
  caseWhen,
  fn,
  inlineLiteral,
  isNotNull,
  isNull,
  list,
  raw,
  valueToOperand,
  type ValueOperandInput
} from '../core/ast/expression-builders.js';
import type { DialectBranch } from '../core/sql/sql.js';
import type { AggregateExpression } from './aggregate/aggregate-expression.js';
import { AvgExpression, CountExpression, MaxExpression, MinExpression, SumExpression } from './aggregate/basic.js';
import { StringAggExpression } from './aggregate/string-agg.js';
import { ArrayAggExpression, JsonArrayAggExpression, JsonObjectAggExpression } from './aggregate/collection.js';
import { BitAndExpression, BitOrExpression, BoolAndExpression, BoolOrExpression } from './aggregate/bitwise.js';
import { StdDevExpression, VarianceExpression } from './aggregate/statistical.js';

export interface ExpressionBuilderOptions {
  /** Alias used to qualify bare column names */
  tableAlias?: string;
}

/**
 * Optional configuration callback passed to the aggregate factories
 */
export type AggregateConfigurator<T extends AggregateExpression> = (builder: T) => void;

/**
 * Expression facility bound to one query's table alias.
 *
 * Produces column references, raw fragments and CASE expressions, and hands
 * out the aggregate builders.
 *
 * @example
 * const eb = new ExpressionBuilder({ tableAlias: 'p' });
 * const published = eb.count(c => c.all().filter(eq(eb.column('status'), 'published')));
 * new PostgresDialect().compileAggregate(published);
 * // COUNT(*) FILTER (WHERE "p"."status" = $1)
 */
export class ExpressionBuilder {
  readonly tableAlias?: string;

  constructor(options: ExpressionBuilderOptions = {}) {
    this.tableAlias = options.tableAlias;
  }

  /**
   * `schema.table.name` keeps its qualifier (split at the last dot); a bare name takes the bound table alias (if any)
   */
  column(name: string): ColumnNode {
    const dotIndex = name.lastIndexOf('.');
    if (dotIndex > -1) {
      return { type: 'Column', table: name.slice(0, dotIndex), name: name.slice(dotIndex + 1) };
    }
    return this.tableAlias ? { type: 'Column', table: this.tableAlias, name } : { type: 'Column', name };
  }

  /**
   * Raw SQL with `?` placeholders filled by `args`
   */
  expr(sql: string, ...args: ValueOperandInput[]): RawNode {
    return raw(sql, ...args);
  }

  /**
   * Comma-separated list of expressions
   */
  exprs(...items: ValueOperandInput[]): ListNode {
    return list(items);
  }

  /**
   * Expressions joined by a custom separator
   */
  exprsWith(separator: string, ...items: ValueOperandInput[]): ListNode {
    return list(items, separator);
  }

  /**
   * Picks an operand per dialect at compile time; NULL when no branch matches
   */
  exprByDialect(branches: Partial<Record<DialectBranch, ValueOperandInput>>): DialectExpressionNode {
    const resolved: DialectExpressionNode['branches'] = {};
    for (const [key, value] of Object.entries(branches)) {
      if (value !== undefined && isDialectBranch(key)) {
        resolved[key] = valueToOperand(value);
      }
    }
    return { type: 'DialectExpression', branches: resolved };
  }

  caseWhen(
    conditions: { when: ExpressionNode; then: ValueOperandInput }[],
    elseValue?: ValueOperandInput
  ): CaseExpressionNode {
    return caseWhen(conditions, elseValue);
  }

  isNull(expression: OperandNode): NullExpressionNode {
    return isNull(expression);
  }

  isNotNull(expression: OperandNode): NullExpressionNode {
    return isNotNull(expression);
  }

  /**
   * The SQL NULL keyword
   */
  null(): LiteralNode {
    return inlineLiteral(null);
  }

  /**
   * A value; bound as a parameter unless the dialect inlines literals
   */
  literal(value: LiteralValue): LiteralNode {
    return { type: 'Literal', value };
  }

  fn(name: string, ...args: ValueOperandInput[]): FunctionNode {
    return fn(name, ...args);
  }

  count(configure?: AggregateConfigurator<CountExpression>): CountExpression {
    return configured(new CountExpression(this), configure);
  }

  countColumn(column: string, distinct = false): CountExpression {
    return this.count(c => {
      c.column(column);
      if (distinct) c.distinct();
    });
  }

  countAll(distinct = false): CountExpression {
    return this.count(c => {
      c.all();
      if (distinct) c.distinct();
    });
  }

  sum(configure?: AggregateConfigurator<SumExpression>): SumExpression {
    return configured(new SumExpression(this), configure);
  }

  sumColumn(column: string, distinct = false): SumExpression {
    return this.sum(s => {
      s.column(column);
      if (distinct) s.distinct();
    });
  }

  avg(configure?: AggregateConfigurator<AvgExpression>): AvgExpression {
    return configured(new AvgExpression(this), configure);
  }

  avgColumn(column: string, distinct = false): AvgExpression {
    return this.avg(a => {
      a.column(column);
      if (distinct) a.distinct();
    });
  }

  min(configure?: AggregateConfigurator<MinExpression>): MinExpression {
    return configured(new MinExpression(this), configure);
  }

  minColumn(column: string): MinExpression {
    return this.min(m => m.column(column));
  }

  max(configure?: AggregateConfigurator<MaxExpression>): MaxExpression {
    return configured(new MaxExpression(this), configure);
  }

  maxColumn(column: string): MaxExpression {
    return this.max(m => m.column(column));
  }

  stringAgg(configure?: AggregateConfigurator<StringAggExpression>): StringAggExpression {
    return configured(new StringAggExpression(this), configure);
  }

  arrayAgg(configure?: AggregateConfigurator<ArrayAggExpression>): ArrayAggExpression {
    return configured(new ArrayAggExpression(this), configure);
  }

  jsonObjectAgg(configure?: AggregateConfigurator<JsonObjectAggExpression>): JsonObjectAggExpression {
    return configured(new JsonObjectAggExpression(this), configure);
  }

  jsonArrayAgg(configure?: AggregateConfigurator<JsonArrayAggExpression>): JsonArrayAggExpression {
    return configured(new JsonArrayAggExpression(this), configure);
  }

  bitOr(configure?: AggregateConfigurator<BitOrExpression>): BitOrExpression {
    return configured(new BitOrExpression(this), configure);
  }

  bitAnd(configure?: AggregateConfigurator<BitAndExpression>): BitAndExpression {
    return configured(new BitAndExpression(this), configure);
  }

  boolOr(configure?: AggregateConfigurator<BoolOrExpression>): BoolOrExpression {
    return configured(new BoolOrExpression(this), configure);
  }

  boolAnd(configure?: AggregateConfigurator<BoolAndExpression>): BoolAndExpression {
    return configured(new BoolAndExpression(this), configure);
  }

  stdDev(configure?: AggregateConfigurator<StdDevExpression>): StdDevExpression {
    return configured(new StdDevExpression(this), configure);
  }

  variance(configure?: AggregateConfigurator<VarianceExpression>): VarianceExpression {
    return configured(new VarianceExpression(this), configure);
  }
}

const DIALECT_BRANCHES: readonly string[] = ['postgres', 'mysql', 'sqlite', 'default'];

const isDialectBranch = (key: string): key is DialectBranch => DIALECT_BRANCHES.includes(key);

const configured = <T extends AggregateExpression>(builder: T, configure?: AggregateConfigurator<T>): T => {
  configure?.(builder);
  return builder;
};
