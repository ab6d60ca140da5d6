import type { DialectBranch, DialectKey } from '../sql/sql.js';
import { DialectUnsupportedOperationError } from '../errors.js';

/**
 * Keyed handler table; `default` runs when the active dialect has no entry.
 */
export type DialectHandlers<T> = Partial<Record<DialectBranch, () => T>>;

/**
 * Anything that names a dialect: a key or a compiled dialect instance.
 */
export type DialectInput = DialectKey | { readonly dialect: DialectKey };

const dialectKeyOf = (input: DialectInput): DialectKey =>
  typeof input === 'string' ? input : input.dialect;

const pickHandler = <T>(dialect: DialectKey, handlers: DialectHandlers<T>): (() => T) | undefined => {
  switch (dialect) {
    case 'postgres':
      return handlers.postgres ?? handlers.default;
    case 'mysql':
      return handlers.mysql ?? handlers.default;
    case 'sqlite':
      return handlers.sqlite ?? handlers.default;
    default:
      return handlers.default;
  }
};

/**
 * Runs exactly one handler: the active dialect's, else `default`, else none.
 * Handler errors propagate unchanged.
 *
 * @returns the handler's result, or undefined when nothing ran
 */
export const runByDialect = <T>(dialect: DialectInput, handlers: DialectHandlers<T>): T | undefined => {
  const handler = pickHandler(dialectKeyOf(dialect), handlers);
  return handler ? handler() : undefined;
};

/**
 * Strict variant of {@link runByDialect}: a missing handler raises
 * DialectUnsupportedOperationError naming `operation`.
 */
export const selectByDialect = <T>(
  dialect: DialectInput,
  handlers: DialectHandlers<T>,
  operation: string
): T => {
  const key = dialectKeyOf(dialect);
  const handler = pickHandler(key, handlers);
  if (!handler) {
    throw new DialectUnsupportedOperationError(operation, key);
  }
  return handler();
};
