/**
 * Expression AST nodes and builders.
 * Re-exports components for building SQL expression trees.
 */
export * from './expression-nodes.js';
export * from './expression-builders.js';
export type { ColumnRef } from './types.js';
