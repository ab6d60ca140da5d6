import { describe, it, expect, vi } from 'vitest';
import { ExpressionBuilder } from '../../src/query-builder/expression-builder.js';
import { eq, gt } from '../../src/core/ast/expression-builders.js';
import { Dialect } from '../../src/core/dialect/abstract.js';
import { PostgresDialect } from '../../src/core/dialect/postgres/index.js';
import { MySqlDialect } from '../../src/core/dialect/mysql/index.js';
import { DialectUnsupportedOperationError } from '../../src/core/errors.js';
import { captureError, plain, plainDialects } from './aggregate-test-utils.js';

describe('aggregate rendering', () => {
  const eb = new ExpressionBuilder();
  const { postgres, mysql, sqlite } = plainDialects();

  it('renders the same builder repeatedly without mutating it', () => {
    const titles = eb.stringAgg(s =>
      s.column('title').distinct().orderBy('title').filter(eq(eb.column('status'), 'published'))
    );

    const first = postgres.compileAggregate(titles).sql;
    expect(mysql.compileAggregate(titles).sql).toBe(
      "GROUP_CONCAT(DISTINCT CASE WHEN status = 'published' THEN title ELSE NULL END ORDER BY title ASC SEPARATOR ',')"
    );
    expect(sqlite.compileAggregate(titles).sql).toBe(
      "GROUP_CONCAT(DISTINCT title ORDER BY title ASC) FILTER (WHERE status = 'published')"
    );
    expect(postgres.compileAggregate(titles).sql).toBe(first);
    expect(first).toBe("STRING_AGG(DISTINCT title, ',' ORDER BY title ASC) FILTER (WHERE status = 'published')");
  });

  it('keeps ORDER BY for PostgreSQL after a dialect that dropped it', () => {
    const titles = eb.arrayAgg(a => a.column('title').orderBy('title'));

    expect(postgres.compileAggregate(titles).sql).toBe('ARRAY_AGG(title ORDER BY title ASC)');
    expect(mysql.compileAggregate(titles).sql).toBe('JSON_ARRAYAGG(title)');
    expect(postgres.compileAggregate(titles).sql).toBe('ARRAY_AGG(title ORDER BY title ASC)');
  });

  it('renders through the builder itself', () => {
    expect(eb.countAll().render(mysql)).toEqual({ sql: 'COUNT(*)', params: [] });
  });

  it('numbers PostgreSQL placeholders per compilation', () => {
    const published = eb.countAll().filter(eq(eb.column('status'), 'published'));
    const dialect = new PostgresDialect({ quoteIdentifiers: false });

    expect(dialect.compileAggregate(published).params).toEqual(['published']);
    expect(dialect.compileAggregate(published).sql).toBe('COUNT(*) FILTER (WHERE status = $1)');
  });

  it('embeds an aggregate inside other expressions', () => {
    const anyPublished = eb.caseWhen(
      [{ when: gt(eb.countAll().filter(eq(eb.column('status'), 'published')).toOperand(), 0), then: 'yes' }],
      'no'
    );

    expect(mysql.compileFragment(anyPublished).sql).toBe(
      "CASE WHEN SUM(CASE WHEN status = 'published' THEN 1 ELSE 0 END) > 0 THEN 'yes' ELSE 'no' END"
    );
  });

  it('compiles a projection with one parameter sequence', () => {
    const scoped = new ExpressionBuilder({ tableAlias: 'p' });
    const projection = {
      published: scoped.count(c => c.all().filter(eq(scoped.column('status'), 'published'))),
      total_views: scoped.sumColumn('view_count'),
    };

    expect(new PostgresDialect().compileProjection(projection)).toEqual({
      sql: 'COUNT(*) FILTER (WHERE "p"."status" = $1) AS "published", SUM("p"."view_count") AS "total_views"',
      params: ['published'],
    });
    expect(new MySqlDialect().compileProjection(projection)).toEqual({
      sql: 'SUM(CASE WHEN `p`.`status` = ? THEN 1 ELSE 0 END) AS `published`, SUM(`p`.`view_count`) AS `total_views`',
      params: ['published'],
    });
  });

  it('accepts plain operands in a projection', () => {
    const projection = {
      label: eb.literal('posts'),
      views: eb.maxColumn('view_count').filter(gt(eb.column('view_count'), 5)),
    };

    expect(new PostgresDialect({ quoteIdentifiers: false }).compileProjection(projection)).toEqual({
      sql: '$1 AS label, MAX(view_count) FILTER (WHERE view_count > $2) AS views',
      params: ['posts', 5],
    });
  });

  it('rejects dialect-specific families on an unknown dialect', () => {
    const oracle = Dialect.create('oracle', plain);
    const error = captureError(() => oracle.compileAggregate(eb.stringAgg(s => s.column('title'))));

    expect(error).toBeInstanceOf(DialectUnsupportedOperationError);
    expect(error).toMatchObject({
      code: 'DIALECT_UNSUPPORTED_OPERATION',
      dialect: 'oracle',
      message: 'STRING_AGG is not supported for dialect "oracle"',
    });
  });

  it('renders portable families on an unknown dialect', () => {
    const oracle = Dialect.create('oracle');
    const published = eb.countColumn('id').filter(eq(eb.column('status'), 'published'));

    expect(oracle.compileAggregate(published)).toEqual({
      sql: 'COUNT("id") FILTER (WHERE "status" = ?)',
      params: ['published'],
    });
  });

  it('does not call the logger when nothing is dropped', () => {
    const logger = vi.fn();
    const dialects = plainDialects({ logger });
    const titles = eb.jsonArrayAgg(j => j.column('title'));

    dialects.mysql.compileAggregate(titles);
    dialects.sqlite.compileAggregate(titles);

    expect(logger).not.toHaveBeenCalled();
  });

  it('reports a drop again on every compilation', () => {
    const logger = vi.fn();
    const dialects = plainDialects({ logger });
    const titles = eb.jsonArrayAgg(j => j.column('title').distinct());

    dialects.mysql.compileAggregate(titles);
    dialects.mysql.compileAggregate(titles);

    expect(logger).toHaveBeenCalledTimes(2);
  });
});
