import { PGlite } from '@electric-sql/pglite';

import type { CompiledQuery } from '../../src/core/dialect/abstract.js';

export const runSql = async (
  db: PGlite,
  sql: string,
  params: unknown[] = []
): Promise<void> => {
  await db.query(sql, params);
};

/**
 * Runs a compiled statement and returns its rows as plain objects
 */
export const queryCompiled = async (
  db: PGlite,
  compiled: CompiledQuery
): Promise<Array<Record<string, unknown>>> => {
  const { rows } = await db.query<Record<string, unknown>>(compiled.sql, compiled.params);
  return rows;
};
