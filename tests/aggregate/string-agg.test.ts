import { describe, it, expect, vi } from 'vitest';
import { ExpressionBuilder } from '../../src/query-builder/expression-builder.js';
import { PostgresDialect } from '../../src/core/dialect/postgres/index.js';
import { gt } from '../../src/core/ast/expression-builders.js';
import { plainDialects } from './aggregate-test-utils.js';

describe('STRING_AGG', () => {
  const eb = new ExpressionBuilder();
  const { postgres, mysql, sqlite } = plainDialects();

  it('maps to STRING_AGG / GROUP_CONCAT with the default comma separator', () => {
    const titles = eb.stringAgg(s => s.column('title'));

    expect(postgres.compileAggregate(titles).sql).toBe("STRING_AGG(title, ',')");
    expect(mysql.compileAggregate(titles).sql).toBe("GROUP_CONCAT(title SEPARATOR ',')");
    expect(sqlite.compileAggregate(titles).sql).toBe("GROUP_CONCAT(title, ',')");
  });

  it('places ORDER BY and the separator where each engine expects them', () => {
    const titles = eb.stringAgg(s => s.column('title').orderBy('title').separator(', '));

    expect(postgres.compileAggregate(titles).sql).toBe("STRING_AGG(title, ', ' ORDER BY title ASC)");
    expect(mysql.compileAggregate(titles).sql).toBe("GROUP_CONCAT(title ORDER BY title ASC SEPARATOR ', ')");
    expect(sqlite.compileAggregate(titles).sql).toBe("GROUP_CONCAT(title, ', ' ORDER BY title ASC)");
  });

  it('emits ordering terms in call order', () => {
    const titles = eb.stringAgg(s => s.column('title').orderByDesc('view_count').orderBy('title', 'slug'));

    expect(postgres.compileAggregate(titles).sql).toBe(
      "STRING_AGG(title, ',' ORDER BY view_count DESC, title ASC, slug ASC)"
    );
  });

  it('drops the separator for DISTINCT on SQLite and reports it', () => {
    const logger = vi.fn();
    const { sqlite: logged } = plainDialects({ logger });
    const titles = eb.stringAgg(s => s.column('title').distinct().separator(' | '));

    expect(logged.compileAggregate(titles).sql).toBe('GROUP_CONCAT(DISTINCT title)');
    expect(logger).toHaveBeenCalledTimes(1);
    expect(logger).toHaveBeenCalledWith({
      level: 'warn',
      dialect: 'sqlite',
      fn: 'STRING_AGG',
      message: 'GROUP_CONCAT(DISTINCT ...) takes no separator; " | " was dropped',
    });
  });

  it('stays silent for DISTINCT on SQLite with the default separator', () => {
    const logger = vi.fn();
    const { sqlite: logged } = plainDialects({ logger });

    expect(logged.compileAggregate(eb.stringAgg(s => s.column('title').distinct())).sql).toBe(
      'GROUP_CONCAT(DISTINCT title)'
    );
    expect(logger).not.toHaveBeenCalled();
  });

  it('keeps DISTINCT and the separator on PostgreSQL and MySQL', () => {
    const titles = eb.stringAgg(s => s.column('title').distinct().separator('; '));

    expect(postgres.compileAggregate(titles).sql).toBe("STRING_AGG(DISTINCT title, '; ')");
    expect(mysql.compileAggregate(titles).sql).toBe("GROUP_CONCAT(DISTINCT title SEPARATOR '; ')");
  });

  it('rewrites IGNORE NULLS into a CASE guard', () => {
    const titles = eb.stringAgg(s => s.column('title').ignoreNulls());

    expect(postgres.compileAggregate(titles).sql).toBe(
      "STRING_AGG(CASE WHEN title IS NOT NULL THEN title END, ',')"
    );
    expect(mysql.compileAggregate(titles).sql).toBe(
      "GROUP_CONCAT(CASE WHEN title IS NOT NULL THEN title END SEPARATOR ',')"
    );
    expect(sqlite.compileAggregate(titles).sql).toBe(
      "GROUP_CONCAT(CASE WHEN title IS NOT NULL THEN title END, ',')"
    );
  });

  it('emits nothing for RESPECT NULLS', () => {
    const titles = eb.stringAgg(s => s.column('title').respectNulls());

    expect(postgres.compileAggregate(titles).sql).toBe("STRING_AGG(title, ',')");
  });

  it('uses the last null-handling call', () => {
    const ignored = eb.stringAgg(s => s.column('title').respectNulls().ignoreNulls());
    const respected = eb.stringAgg(s => s.column('title').ignoreNulls().respectNulls());

    expect(postgres.compileAggregate(ignored).sql).toBe(
      "STRING_AGG(CASE WHEN title IS NOT NULL THEN title END, ',')"
    );
    expect(postgres.compileAggregate(respected).sql).toBe("STRING_AGG(title, ',')");
  });

  it('keeps NULLS FIRST/LAST natively and emulates it on MySQL', () => {
    const titles = eb.stringAgg(s =>
      s.column('title').orderByExpr(eb.column('published_at'), 'DESC', 'LAST')
    );

    expect(postgres.compileAggregate(titles).sql).toBe(
      "STRING_AGG(title, ',' ORDER BY published_at DESC NULLS LAST)"
    );
    expect(sqlite.compileAggregate(titles).sql).toBe(
      "GROUP_CONCAT(title, ',' ORDER BY published_at DESC NULLS LAST)"
    );
    expect(mysql.compileAggregate(titles).sql).toBe(
      "GROUP_CONCAT(title ORDER BY (published_at IS NULL) ASC, published_at DESC SEPARATOR ',')"
    );
  });

  it('sorts NULLs first on MySQL with a descending null key', () => {
    const titles = eb.stringAgg(s => s.column('title').orderByExpr(eb.column('published_at'), 'ASC', 'FIRST'));

    expect(mysql.compileAggregate(titles).sql).toBe(
      "GROUP_CONCAT(title ORDER BY (published_at IS NULL) DESC, published_at ASC SEPARATOR ',')"
    );
  });

  it('binds argument parameters before filter parameters and inlines the separator', () => {
    const titles = eb.stringAgg(s =>
      s.expr(eb.fn('COALESCE', eb.column('title'), eb.literal('untitled')))
        .filter(gt(eb.column('view_count'), 10))
    );

    expect(new PostgresDialect().compileAggregate(titles)).toEqual({
      sql: `STRING_AGG(COALESCE("title", $1), ',') FILTER (WHERE "view_count" > $2)`,
      params: ['untitled', 10],
    });
  });
});
