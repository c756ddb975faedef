/**
 * Solver module exports
 */

export * from './search-node.js';
export * from './frontier.js';
export * from './heuristics.js';
export * from './move-generator.js';
export * from './strategies.js';
export * from './trace.js';
export * from './engine.js';
export * from './solver.js';
