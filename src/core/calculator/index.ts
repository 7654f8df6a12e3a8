/**
 * Calculator module barrel file.
 */
export * from './calculator.js';
export * from './history.js';
export * from './operations.js';
export * from './types.js';
