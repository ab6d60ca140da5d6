import sqlite3 from 'sqlite3';

import type { CompiledQuery } from '../../src/core/dialect/abstract.js';

export const execSql = (db: sqlite3.Database, sql: string): Promise<void> =>
  new Promise((resolve, reject) => {
    db.exec(sql, err => (err ? reject(err) : resolve()));
  });

export const runSql = (
  db: sqlite3.Database,
  sql: string,
  params: unknown[]
): Promise<void> =>
  new Promise((resolve, reject) => {
    db.run(sql, params, err => (err ? reject(err) : resolve()));
  });

export const closeDb = (db: sqlite3.Database): Promise<void> =>
  new Promise((resolve, reject) => {
    db.close(err => (err ? reject(err) : resolve()));
  });

const isRow = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Runs a compiled statement and returns its rows as plain objects
 */
export const queryCompiled = (
  db: sqlite3.Database,
  compiled: CompiledQuery
): Promise<Array<Record<string, unknown>>> =>
  new Promise((resolve, reject) => {
    db.all(compiled.sql, compiled.params, (err, rows) => {
      if (err) {
        reject(err);
        return;
      }

      resolve(rows.filter(isRow));
    });
  });
