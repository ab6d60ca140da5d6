import type { DialectKey } from '../sql/sql.js';

/**
 * Notice emitted when a dialect drops part of an aggregate it cannot express
 */
export interface CompileLogEntry {
  level: 'warn';
  dialect: DialectKey;
  /** Aggregate family, e.g. ARRAY_AGG */
  fn: string;
  message: string;
}

export type CompileLogger = (entry: CompileLogEntry) => void;

export interface DialectOptions {
  /** Quote identifiers with the dialect's quote character (default: true) */
  quoteIdentifiers?: boolean;
  /** Render literals in place instead of binding parameters (default: false) */
  inlineLiterals?: boolean;
  /** Receives degradation notices; silent when omitted */
  logger?: CompileLogger;
}

export interface ResolvedDialectOptions {
  quoteIdentifiers: boolean;
  inlineLiterals: boolean;
  logger?: CompileLogger;
}

export const resolveDialectOptions = (options: DialectOptions = {}): ResolvedDialectOptions => ({
  quoteIdentifiers: options.quoteIdentifiers ?? true,
  inlineLiterals: options.inlineLiterals ?? false,
  logger: options.logger
});
