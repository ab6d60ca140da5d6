export * from './aggregate-expression.js';
export * from './capabilities.js';
export * from './basic.js';
export * from './string-agg.js';
export * from './collection.js';
export * from './bitwise.js';
export * from './statistical.js';
export * from './functions.js';
