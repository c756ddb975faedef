/**
 * Expense 8-Puzzle Solver
 *
 * Solves the 3x3 sliding puzzle, where each move costs the number on the
 * moved tile, with seven classical search methods and compares them.
 */

// Domain exports
export * from './domain/types.js';
export * from './domain/constants.js';
export * from './domain/errors.js';

// State exports
export * from './state/puzzle-state.js';
export * from './state/state-hash.js';

// Constraint exports
export * from './constraints/validator.js';
export * from './constraints/solvability.js';

// Solver exports
export * from './solver/index.js';

// I/O exports
export * from './io/puzzle-parser.js';
export * from './io/solution-formatter.js';
export * from './io/trace-writer.js';
