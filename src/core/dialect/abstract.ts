import {
  ExpressionNode,
  BinaryExpressionNode,
  LogicalExpressionNode,
  NullExpressionNode,
  InExpressionNode,
  BetweenExpressionNode,
  LiteralNode,
  LiteralValue,
  ColumnNode,
  OperandNode,
  FunctionNode,
  RawNode,
  ListNode,
  CaseExpressionNode,
  AggregateNode,
  AggregateCallNode,
  AggregateSource,
  AggregateTarget,
  DialectExpressionNode,
  OrderByNode,
  isEmptyCondition,
  isOperandNode
} from '../ast/expression.js';
import type { DialectKey } from '../sql/sql.js';
import { createLiteralFormatter, type LiteralFormatter } from '../sql/literal-formatter.js';
import { AggregateCompiler } from './base/aggregate-compiler.js';
import { OrderByCompiler } from './base/orderby-compiler.js';
import { runByDialect } from './dispatch.js';
import { DialectOptions, ResolvedDialectOptions, resolveDialectOptions } from './dialect-options.js';

/**
 * Context for SQL compilation with parameter management
 */
export interface CompilerContext {
  /** Array of parameters */
  params: unknown[];
  /** Function to add a parameter and get its placeholder */
  addParameter(value: unknown): string;
}

/**
 * Result of SQL compilation
 */
export interface CompiledQuery {
  /** Generated SQL string */
  sql: string;
  /** Parameters for the query */
  params: unknown[];
}

/**
 * Projection input: aggregate builders or any operand, keyed by output alias
 */
export type ProjectionInput = Record<string, AggregateSource | OperandNode>;

/**
 * Abstract base class for SQL dialect implementations
 */
export abstract class Dialect {
  /** Dialect identifier used for aggregate rewriting and dispatch */
  public abstract readonly dialect: DialectKey;

  protected readonly options: ResolvedDialectOptions;
  protected readonly literalFormatter: LiteralFormatter;

  private readonly expressionCompilers: Map<string, (node: ExpressionNode, ctx: CompilerContext) => string>;
  private readonly operandCompilers: Map<string, (node: OperandNode, ctx: CompilerContext) => string>;

  protected constructor(options?: DialectOptions, literalFormatter?: LiteralFormatter) {
    this.options = resolveDialectOptions(options);
    this.literalFormatter = literalFormatter ?? createLiteralFormatter();
    this.expressionCompilers = new Map();
    this.operandCompilers = new Map();
    this.registerDefaultOperandCompilers();
    this.registerDefaultExpressionCompilers();
  }

  /**
   * Creates a minimal dialect under a custom key (for testing purposes).
   * It quotes with double quotes, binds `?` placeholders and supports FILTER.
   */
  static create(name: DialectKey = 'generic', options?: DialectOptions): Dialect {
    class TestDialect extends Dialect {
      public readonly dialect: DialectKey = name;
      constructor() {
        super(options);
      }
      protected wrapIdentifier(id: string): string {
        return `"${id}"`;
      }
    }
    return new TestDialect();
  }

  /**
   * Whether the engine accepts `agg(...) FILTER (WHERE ...)`; when false the
   * filter is folded into the argument with CASE.
   */
  supportsAggregateFilter(): boolean {
    return true;
  }

  /**
   * Compiles one aggregate builder into a standalone fragment (no trailing semicolon)
   */
  compileAggregate(source: AggregateSource): CompiledQuery {
    return this.compileFragment({ type: 'Aggregate', source });
  }

  /**
   * Compiles any operand or condition into a standalone fragment
   */
  compileFragment(node: ExpressionNode): CompiledQuery {
    const ctx = this.createCompilerContext();
    const sql = this.compileExpression(node, ctx);
    return {
      sql,
      params: [...ctx.params]
    };
  }

  /**
   * Compiles a select list `expr AS alias, ...` sharing one parameter sequence
   */
  compileProjection(columns: ProjectionInput): CompiledQuery {
    const ctx = this.createCompilerContext();
    const parts = Object.entries(columns).map(([alias, value]) => {
      const node: OperandNode = isOperandNode(value) ? value : { type: 'Aggregate', source: value };
      return `${this.compileOperand(node, ctx)} AS ${this.quoteIdentifier(alias)}`;
    });
    return {
      sql: parts.join(', '),
      params: [...ctx.params]
    };
  }

  /**
   * Quotes an SQL identifier unless quoting is switched off
   * @param id - Identifier to quote
   * @returns Quoted identifier
   */
  quoteIdentifier(id: string): string {
    return this.options.quoteIdentifiers ? this.wrapIdentifier(id) : id;
  }

  /**
   * Wraps an identifier in the dialect's quote characters (to be implemented by concrete dialects)
   */
  protected abstract wrapIdentifier(id: string): string;

  /**
   * Creates a new compiler context
   * @returns Compiler context with parameter management
   */
  protected createCompilerContext(): CompilerContext {
    const params: unknown[] = [];
    let counter = 0;
    return {
      params,
      addParameter: (value: unknown) => {
        counter += 1;
        params.push(value);
        return this.formatPlaceholder(counter);
      }
    };
  }

  /**
   * Formats a parameter placeholder
   * @param index - Parameter index
   * @returns Formatted placeholder string
   */
  protected formatPlaceholder(_index: number): string {
    void _index;
    return '?';
  }

  protected formatLiteral(value: LiteralValue): string {
    return this.literalFormatter.formatLiteral(value);
  }

  /**
   * Compile-time target handed to aggregate builders
   */
  protected createAggregateTarget(): AggregateTarget {
    const { logger } = this.options;
    return {
      dialect: this.dialect,
      notice: (fn, message) => {
        logger?.({ level: 'warn', dialect: this.dialect, fn, message });
      }
    };
  }

  /**
   * Registers an expression compiler for a specific node type
   * @param type - Expression node type
   * @param compiler - Compiler function
   */
  protected registerExpressionCompiler<T extends ExpressionNode>(type: T['type'], compiler: (node: T, ctx: CompilerContext) => string): void {
    this.expressionCompilers.set(type, compiler as (node: ExpressionNode, ctx: CompilerContext) => string);
  }

  /**
   * Registers an operand compiler for a specific node type
   * @param type - Operand node type
   * @param compiler - Compiler function
   */
  protected registerOperandCompiler<T extends OperandNode>(type: T['type'], compiler: (node: T, ctx: CompilerContext) => string): void {
    this.operandCompilers.set(type, compiler as (node: OperandNode, ctx: CompilerContext) => string);
  }

  /**
   * Compiles an expression node; operands used as conditions go through the operand compilers
   * @param node - Expression node to compile
   * @param ctx - Compiler context
   * @returns Compiled SQL expression
   */
  protected compileExpression(node: ExpressionNode, ctx: CompilerContext): string {
    if (isOperandNode(node)) {
      return this.compileOperand(node, ctx);
    }
    const compiler = this.expressionCompilers.get(node.type);
    if (!compiler) {
      throw new Error(`Unsupported expression node type "${node.type}" for ${this.constructor.name}`);
    }
    return compiler(node, ctx);
  }

  /**
   * Compiles an operand node
   * @param node - Operand node to compile
   * @param ctx - Compiler context
   * @returns Compiled SQL operand
   */
  protected compileOperand(node: OperandNode, ctx: CompilerContext): string {
    const compiler = this.operandCompilers.get(node.type);
    if (!compiler) {
      throw new Error(`Unsupported operand node type "${node.type}" for ${this.constructor.name}`);
    }
    return compiler(node, ctx);
  }

  /**
   * Compiles an ordering term (operand or expression).
   */
  protected compileOrderingTerm(term: OrderByNode['term'], ctx: CompilerContext): string {
    if (isOperandNode(term)) {
      return this.compileOperand(term, ctx);
    }
    return `(${this.compileExpression(term, ctx)})`;
  }

  protected compileOrderBy(orderBy: OrderByNode[], ctx: CompilerContext): string {
    return OrderByCompiler.compileOrderBy(orderBy, term => this.compileOrderingTerm(term, ctx));
  }

  /**
   * Renders a specialized aggregate call, emulating FILTER where the engine lacks it
   */
  protected compileAggregateCall(call: AggregateCallNode, ctx: CompilerContext): string {
    const filtered = call.filter && isEmptyCondition(call.filter) ? { ...call, filter: undefined } : call;
    const node = filtered.filter && !this.supportsAggregateFilter()
      ? AggregateCompiler.emulateFilter(filtered)
      : filtered;
    return AggregateCompiler.compileCall(node, {
      renderOperand: operand => this.compileOperand(operand, ctx),
      renderExpression: expr => this.compileExpression(expr, ctx),
      renderOrderBy: orderBy => this.compileOrderBy(orderBy, ctx),
      renderLiteral: value => this.formatLiteral(value)
    });
  }

  /**
   * Binds `?` placeholders in order. Without arguments the SQL is emitted as written;
   * otherwise `?` inside single-quoted literals is kept and `??` stands for a literal `?`.
   */
  protected compileRaw(node: RawNode, ctx: CompilerContext): string {
    if (node.args.length === 0) return node.sql;

    const segments: string[] = [];
    let current = '';
    let quoted = false;
    for (let i = 0; i < node.sql.length; i++) {
      const char = node.sql[i];
      if (char === "'") {
        quoted = !quoted;
        current += char;
      } else if (char === '?' && !quoted) {
        if (node.sql[i + 1] === '?') {
          current += '?';
          i++;
        } else {
          segments.push(current);
          current = '';
        }
      } else {
        current += char;
      }
    }
    segments.push(current);

    const placeholders = segments.length - 1;
    if (placeholders !== node.args.length) {
      throw new Error(
        `Raw SQL "${node.sql}" has ${placeholders} placeholder(s) but ${node.args.length} argument(s)`
      );
    }
    return segments
      .map((segment, index) => (index < node.args.length ? segment + this.compileOperand(node.args[index], ctx) : segment))
      .join('');
  }

  private registerDefaultExpressionCompilers(): void {
    this.registerExpressionCompiler('BinaryExpression', (binary: BinaryExpressionNode, ctx) => {
      const left = this.compileOperand(binary.left, ctx);
      const right = this.compileOperand(binary.right, ctx);
      const base = `${left} ${binary.operator} ${right}`;
      if (binary.escape) {
        const escapeOperand = this.compileOperand(binary.escape, ctx);
        return `${base} ESCAPE ${escapeOperand}`;
      }
      return base;
    });

    this.registerExpressionCompiler('LogicalExpression', (logical: LogicalExpressionNode, ctx) => {
      const operands = logical.operands.filter(op => !isEmptyCondition(op));
      if (operands.length === 0) return '';
      const parts = operands.map(op => {
        const compiled = this.compileExpression(op, ctx);
        const grouped = operands.length > 1 && (op.type === 'LogicalExpression' || op.type === 'Raw');
        return grouped ? `(${compiled})` : compiled;
      });
      return parts.join(` ${logical.operator} `);
    });

    this.registerExpressionCompiler('NullExpression', (nullExpr: NullExpressionNode, ctx) => {
      const left = this.compileOperand(nullExpr.left, ctx);
      return `${left} ${nullExpr.operator}`;
    });

    this.registerExpressionCompiler('InExpression', (inExpr: InExpressionNode, ctx) => {
      const left = this.compileOperand(inExpr.left, ctx);
      const values = inExpr.right.map(v => this.compileOperand(v, ctx)).join(', ');
      return `${left} ${inExpr.operator} (${values})`;
    });

    this.registerExpressionCompiler('BetweenExpression', (betweenExpr: BetweenExpressionNode, ctx) => {
      const left = this.compileOperand(betweenExpr.left, ctx);
      const lower = this.compileOperand(betweenExpr.lower, ctx);
      const upper = this.compileOperand(betweenExpr.upper, ctx);
      return `${left} ${betweenExpr.operator} ${lower} AND ${upper}`;
    });
  }

  private registerDefaultOperandCompilers(): void {
    this.registerOperandCompiler('Literal', (literal: LiteralNode, ctx) =>
      literal.inline || this.options.inlineLiterals
        ? this.formatLiteral(literal.value)
        : ctx.addParameter(literal.value)
    );

    this.registerOperandCompiler('Column', (column: ColumnNode, _ctx) => {
      void _ctx;
      const name = this.quoteIdentifier(column.name);
      if (!column.table) return name;
      const table = column.table.split('.').map(part => this.quoteIdentifier(part)).join('.');
      return `${table}.${name}`;
    });

    this.registerOperandCompiler('Raw', (node: RawNode, ctx) => this.compileRaw(node, ctx));

    this.registerOperandCompiler('List', (node: ListNode, ctx) =>
      node.items.map(item => this.compileOperand(item, ctx)).join(node.separator)
    );

    this.registerOperandCompiler('Function', (fnNode: FunctionNode, ctx) => {
      const compiledArgs = fnNode.args.map(arg => this.compileOperand(arg, ctx));
      return `${fnNode.name}(${compiledArgs.join(', ')})`;
    });

    this.registerOperandCompiler('CaseExpression', (node: CaseExpressionNode, ctx) => {
      const parts = ['CASE'];
      for (const { when, then } of node.conditions) {
        parts.push(`WHEN ${this.compileExpression(when, ctx)} THEN ${this.compileOperand(then, ctx)}`);
      }
      if (node.else) {
        parts.push(`ELSE ${this.compileOperand(node.else, ctx)}`);
      }
      parts.push('END');
      return parts.join(' ');
    });

    this.registerOperandCompiler('Aggregate', (node: AggregateNode, ctx) =>
      this.compileAggregateCall(node.source.specialize(this.createAggregateTarget()), ctx)
    );

    this.registerOperandCompiler('AggregateCall', (node: AggregateCallNode, ctx) =>
      this.compileAggregateCall(node, ctx)
    );

    this.registerOperandCompiler('DialectExpression', (node: DialectExpressionNode, ctx) => {
      const { postgres, mysql, sqlite, default: fallback } = node.branches;
      const picked = runByDialect(this, {
        postgres: postgres && (() => postgres),
        mysql: mysql && (() => mysql),
        sqlite: sqlite && (() => sqlite),
        default: fallback && (() => fallback)
      });
      return picked ? this.compileOperand(picked, ctx) : 'NULL';
    });
  }
}
