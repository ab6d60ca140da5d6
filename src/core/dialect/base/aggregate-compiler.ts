import type {
  AggregateCallNode,
  ExpressionNode,
  OperandNode,
  OrderByNode
} from '../../ast/expression-nodes.js';
import { and, caseWhen, inlineLiteral, isNotNull, isStar } from '../../ast/expression-builders.js';
import { AGGREGATE_FUNCTIONS } from '../../sql/sql.js';

/**
 * Rendering hooks supplied by the dialect; each call may register parameters,
 * so they are invoked in emission order.
 */
export interface AggregateRenderer {
  renderOperand(node: OperandNode): string;
  renderExpression(node: ExpressionNode): string;
  renderOrderBy(orderBy: OrderByNode[]): string;
  renderLiteral(value: string): string;
}

/**
 * Renders specialized aggregate calls, natively or with FILTER emulated through CASE.
 */
export class AggregateCompiler {
  /**
   * `NAME([DISTINCT ]args[ ORDER BY ...][ SEPARATOR sep])[ IGNORE|RESPECT NULLS][ FILTER (WHERE cond)]`
   */
  static compileCall(call: AggregateCallNode, renderer: AggregateRenderer): string {
    const distinct = call.distinct ? 'DISTINCT ' : '';
    const args = call.args.map(arg => renderer.renderOperand(arg)).join(', ');
    const orderBy = renderer.renderOrderBy(call.orderBy);
    const separator = call.separator !== undefined ? ` SEPARATOR ${renderer.renderLiteral(call.separator)}` : '';
    const nulls = call.nulls ? ` ${call.nulls}` : '';
    const filter = call.filter ? ` FILTER (WHERE ${renderer.renderExpression(call.filter)})` : '';
    return `${call.name}(${distinct}${args}${orderBy}${separator})${nulls}${filter}`;
  }

  /**
   * Folds the FILTER predicate into the aggregated argument.
   *
   * COUNT becomes a SUM over 1/0 so an empty match still yields 0;
   * SUM falls back to 0, every other family to NULL.
   * JSON_ARRAYAGG and JSON_OBJECTAGG keep NULLs, so on MySQL excluded rows still
   * appear as `null` elements or `key: null` members.
   */
  static emulateFilter(call: AggregateCallNode): AggregateCallNode {
    const { filter } = call;
    if (!filter) return call;

    const value = call.args[call.valueIndex];
    if (value === undefined) {
      throw new Error(`Aggregate ${call.name} has no argument at position ${call.valueIndex}`);
    }

    if (call.name === AGGREGATE_FUNCTIONS.COUNT && !call.distinct) {
      const when = isStar(value) ? filter : and(filter, isNotNull(value));
      return {
        ...call,
        name: AGGREGATE_FUNCTIONS.SUM,
        args: [caseWhen([{ when, then: inlineLiteral(1) }], inlineLiteral(0))],
        valueIndex: 0,
        filter: undefined
      };
    }

    const fallback = call.name === AGGREGATE_FUNCTIONS.SUM ? inlineLiteral(0) : inlineLiteral(null);
    const args = call.args.map((arg, index) =>
      index === call.valueIndex ? caseWhen([{ when: filter, then: arg }], fallback) : arg
    );
    return { ...call, args, filter: undefined };
  }
}
