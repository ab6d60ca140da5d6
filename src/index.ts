/**
 * Cross-dialect aggregate expression compiler.
 * Builds COUNT/SUM/.../STRING_AGG/JSON aggregates once and renders them for
 * PostgreSQL, MySQL and SQLite.
 */
export * from './core/sql/sql.js';
export * from './core/sql/literal-formatter.js';
export * from './core/ast/expression.js';
export * from './core/errors.js';
export * from './core/dialect/abstract.js';
export * from './core/dialect/dialect-options.js';
export * from './core/dialect/dispatch.js';
export * from './core/dialect/dialect-factory.js';
export * from './core/dialect/base/sql-dialect.js';
export * from './core/dialect/base/aggregate-compiler.js';
export * from './core/dialect/base/orderby-compiler.js';
export * from './core/dialect/postgres/index.js';
export * from './core/dialect/mysql/index.js';
export * from './core/dialect/sqlite/index.js';
export * from './query-builder/expression-builder.js';
export * from './query-builder/aggregate/index.js';
