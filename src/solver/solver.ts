/**
 * Main Solver Interface
 */

import type { PuzzleState, SearchMethod, SearchOptions, SearchResult } from '../domain/types.js';
import { createStats } from '../domain/types.js';
import { DEFAULT_SEARCH_OPTIONS, METHOD_ALIASES, SEARCH_METHODS } from '../domain/constants.js';
import { UsageError } from '../domain/errors.js';
import { createState } from '../state/puzzle-state.js';
import { isSolvable } from '../constraints/solvability.js';
import { search } from './engine.js';
import type { SearchTracer } from './trace.js';

/**
 * Main puzzle solver class
 */
export class PuzzleSolver {
  /**
   * Solve from start to goal. With checkParity on, a goal in the other
   * parity component is reported as exhausted without searching.
   */
  solve(
    start: PuzzleState,
    goal: PuzzleState,
    method: SearchMethod,
    options: Partial<SearchOptions> = {},
    tracer?: SearchTracer
  ): SearchResult {
    const opts: SearchOptions = { ...DEFAULT_SEARCH_OPTIONS, ...options };

    if (opts.checkParity && !isSolvable(start, goal)) {
      return {
        method,
        outcome: 'EXHAUSTED',
        found: false,
        moves: [],
        states: [],
        cost: 0,
        depth: 0,
        stats: createStats(),
        elapsedMs: 0,
        unsolvable: true,
      };
    }

    return search({ start, goal }, method, opts, tracer);
  }

  /**
   * Run several methods on the same problem. DLS is left out when no
   * depth limit is given.
   */
  compare(
    start: PuzzleState,
    goal: PuzzleState,
    options: Partial<SearchOptions> = {},
    methods: readonly SearchMethod[] = SEARCH_METHODS,
    tracer?: SearchTracer
  ): SearchResult[] {
    return methods
      .filter(method => method !== 'dls' || options.depthLimit !== undefined)
      .map(method => this.solve(start, goal, method, options, tracer));
  }

  /**
   * Resolve a method name from user input (case-insensitive)
   */
  static parseMethod(name: string): SearchMethod {
    const key = name.trim().toLowerCase();
    if (!Object.prototype.hasOwnProperty.call(METHOD_ALIASES, key)) {
      throw new UsageError(`Unknown search method "${name}". Expected one of: ${SEARCH_METHODS.join(', ')}`);
    }
    return METHOD_ALIASES[key];
  }
}

/**
 * Quick solve function for simple cases
 */
export function quickSolve(
  start: readonly number[],
  goal: readonly number[],
  method: SearchMethod = 'a*',
  options: Partial<SearchOptions> = {}
): SearchResult {
  const solver = new PuzzleSolver();
  return solver.solve(createState(start), createState(goal), method, options);
}
