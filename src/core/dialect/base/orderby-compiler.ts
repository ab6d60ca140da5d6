import type { NullExpressionNode, OrderByNode } from '../../ast/expression-nodes.js';
import { isOperandNode } from '../../ast/expression-nodes.js';

type NullsRenderer = (order: OrderByNode) => string;
type TermRenderer = (term: OrderByNode['term']) => string;

/**
 * Compiler for ORDER BY clauses inside aggregate calls.
 * Handles compilation of sorting expressions with direction (ASC/DESC).
 */
export class OrderByCompiler {
  /**
   * Compiles an ORDER BY clause.
   * @param orderBy - Ordering terms in emission order.
   * @param renderTerm - Function to render an ordering term.
   * @param renderNulls - Optional function to render NULLS FIRST/LAST.
   * @returns SQL ORDER BY clause (e.g., " ORDER BY p.title ASC") or empty string if no ordering.
   */
  static compileOrderBy(
    orderBy: OrderByNode[] | undefined,
    renderTerm: TermRenderer,
    renderNulls?: NullsRenderer
  ): string {
    if (!orderBy || orderBy.length === 0) return '';
    const parts = orderBy.map(o => {
      const term = renderTerm(o.term);
      const nulls = renderNulls ? renderNulls(o) : o.nulls ? ` NULLS ${o.nulls}` : '';
      return `${term} ${o.direction}${nulls}`;
    }).join(', ');
    return ` ORDER BY ${parts}`;
  }

  /**
   * Rewrites NULLS FIRST/LAST into a leading `term IS NULL` sort key
   * for engines without the NULLS clause.
   */
  static expandNullsOrdering(orderBy: OrderByNode[]): OrderByNode[] {
    return orderBy.flatMap(o => {
      if (!o.nulls || !isOperandNode(o.term)) {
        return [{ ...o, nulls: undefined }];
      }
      const nullCheck: NullExpressionNode = { type: 'NullExpression', left: o.term, operator: 'IS NULL' };
      const nullKey: OrderByNode = {
        type: 'OrderBy',
        term: nullCheck,
        direction: o.nulls === 'FIRST' ? 'DESC' : 'ASC'
      };
      return [nullKey, { ...o, nulls: undefined }];
    });
  }
}
