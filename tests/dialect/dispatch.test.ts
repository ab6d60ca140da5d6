import { describe, it, expect, vi } from 'vitest';
import { runByDialect, selectByDialect } from '../../src/core/dialect/dispatch.js';
import { PostgresDialect } from '../../src/core/dialect/postgres/index.js';
import { DialectUnsupportedOperationError } from '../../src/core/errors.js';

describe('runByDialect', () => {
  it('runs only the handler of the active dialect', () => {
    const postgres = vi.fn(() => 'pg');
    const mysql = vi.fn(() => 'my');
    const fallback = vi.fn(() => 'other');

    expect(runByDialect('mysql', { postgres, mysql, default: fallback })).toBe('my');
    expect(mysql).toHaveBeenCalledTimes(1);
    expect(postgres).not.toHaveBeenCalled();
    expect(fallback).not.toHaveBeenCalled();
  });

  it('falls back to default when the dialect has no handler', () => {
    const fallback = vi.fn(() => 'other');

    expect(runByDialect('sqlite', { postgres: () => 'pg', default: fallback })).toBe('other');
    expect(runByDialect('duckdb', { postgres: () => 'pg', default: fallback })).toBe('other');
    expect(fallback).toHaveBeenCalledTimes(2);
  });

  it('returns undefined when nothing matches', () => {
    expect(runByDialect('sqlite', { postgres: () => 'pg' })).toBeUndefined();
  });

  it('accepts a dialect instance', () => {
    expect(runByDialect(new PostgresDialect(), { postgres: () => 1, default: () => 2 })).toBe(1);
  });

  it('propagates handler errors unchanged', () => {
    const failure = new Error('boom');

    expect(() => runByDialect('postgres', { postgres: () => { throw failure; } })).toThrow(failure);
  });
});

describe('selectByDialect', () => {
  it('returns the matching handler result', () => {
    expect(selectByDialect('sqlite', { sqlite: () => 'lite', default: () => 'other' }, 'PAD')).toBe('lite');
  });

  it('throws DialectUnsupportedOperationError without a handler', () => {
    expect(() => selectByDialect('mysql', { postgres: () => 'pg' }, 'PAD')).toThrow(DialectUnsupportedOperationError);
    expect(() => selectByDialect('mysql', { postgres: () => 'pg' }, 'PAD')).toThrow(
      'PAD is not supported for dialect "mysql"'
    );
  });
});
