import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { PGlite } from '@electric-sql/pglite';

import { eq } from '../../src/core/ast/expression.js';
import { PostgresDialect } from '../../src/core/dialect/postgres/index.js';
import type { ProjectionInput } from '../../src/core/dialect/abstract.js';
import { ExpressionBuilder } from '../../src/query-builder/expression-builder.js';
import { queryCompiled, runSql } from './pglite-helpers.js';

const seedPosts = async (db: PGlite): Promise<void> => {
  await runSql(
    db,
    'CREATE TABLE posts (id INTEGER PRIMARY KEY, title TEXT NOT NULL, status TEXT NOT NULL, view_count INTEGER, flags INTEGER NOT NULL, is_featured BOOLEAN NOT NULL);'
  );
  const rows: unknown[][] = [
    [1, 'Alpha', 'published', 10, 1, true],
    [2, 'Beta', 'draft', 20, 0, false],
    [3, 'Gamma', 'published', 30, 2, false],
    [4, 'Delta', 'review', null, 0, true]
  ];
  for (const row of rows) {
    await runSql(
      db,
      'INSERT INTO posts (id, title, status, view_count, flags, is_featured) VALUES ($1, $2, $3, $4, $5, $6);',
      row
    );
  }
};

describe('PostgreSQL aggregate e2e (pglite)', () => {
  let db: PGlite;

  beforeAll(async () => {
    db = new PGlite();
    await seedPosts(db);
  });

  afterAll(async () => {
    await db.close();
  });

  const selectOne = async (projection: ProjectionInput): Promise<Record<string, unknown>> => {
    const compiled = new PostgresDialect().compileProjection(projection);
    const [row] = await queryCompiled(db, {
      sql: `SELECT ${compiled.sql} FROM "posts" AS "p"`,
      params: compiled.params
    });
    return row ?? {};
  };

  const eb = new ExpressionBuilder({ tableAlias: 'p' });
  const published = () => eq(eb.column('status'), 'published');

  it('evaluates the basic families with native FILTER', async () => {
    const row = await selectOne({
      published: eb.countAll().filter(published()),
      published_views: eb.sumColumn('view_count').filter(published()),
      avg_views: eb.avgColumn('view_count').filter(published())
    });

    expect(Number(row.published)).toBe(2);
    expect(Number(row.published_views)).toBe(40);
    expect(Number(row.avg_views)).toBe(20);
  });

  it('evaluates the bit and bool families natively', async () => {
    const row = await selectOne({
      any_flag: eb.bitOr(b => b.column('flags')),
      all_flags: eb.bitAnd(b => b.column('flags')),
      any_featured: eb.boolOr(b => b.column('is_featured')),
      all_featured: eb.boolAnd(b => b.column('is_featured'))
    });

    expect(row).toEqual({ any_flag: 3, all_flags: 0, any_featured: true, all_featured: false });
  });

  it('evaluates ordered collection families', async () => {
    const row = await selectOne({
      titles: eb.stringAgg(s => s.column('title').orderBy('title').filter(published())),
      title_array: eb.arrayAgg(a => a.column('title').orderBy('title').filter(published())),
      title_json: eb.jsonArrayAgg(j => j.column('title').orderByDesc('view_count').filter(published())),
      views_by_title: eb.jsonObjectAgg(j => j.keyColumn('title').column('view_count').filter(published()))
    });

    expect(row.titles).toBe('Alpha,Gamma');
    expect(row.title_array).toEqual(['Alpha', 'Gamma']);
    expect(row.title_json).toEqual(['Gamma', 'Alpha']);
    expect(row.views_by_title).toEqual({ Alpha: 10, Gamma: 30 });
  });

  it('evaluates the sample statistics', async () => {
    const row = await selectOne({
      deviation: eb.stdDev(s => s.column('view_count').sample()),
      spread: eb.variance(v => v.column('view_count').sample())
    });

    expect(Number(row.deviation)).toBe(10);
    expect(Number(row.spread)).toBe(100);
  });
});
