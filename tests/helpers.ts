/**
 * Shared fixtures for the test suite
 */

import type { PuzzleState, SearchResult } from '../src/domain/types.js';
import { moveLabel } from '../src/domain/types.js';
import { createState } from '../src/state/puzzle-state.js';
import { generateSuccessors } from '../src/solver/move-generator.js';
import { PriorityQueue } from '../src/solver/frontier.js';
import { stateKey } from '../src/state/state-hash.js';

export const GOAL: PuzzleState = createState([1, 2, 3, 4, 5, 6, 7, 8, 0]);

// Two moves from GOAL: 5 left, then 6 up
export const ROUND_TRIP_START: PuzzleState = createState([1, 2, 3, 4, 0, 5, 7, 8, 6]);

// Deep instances, far from GOAL
export const HARD_STARTS: PuzzleState[] = [
  createState([8, 6, 7, 2, 5, 4, 3, 0, 1]),
  createState([6, 4, 7, 8, 5, 0, 3, 2, 1]),
];

// Tiles 1 and 2 swapped: odd inversion count, unreachable from GOAL
export const UNREACHABLE_START: PuzzleState = createState([2, 1, 3, 4, 5, 6, 7, 8, 0]);

/**
 * Walk from a state by picking successors by index (wrapped to the
 * number of legal moves). The result is always reachable from the input.
 */
export function scramble(state: PuzzleState, picks: number[]): PuzzleState {
  let current = state;
  for (const pick of picks) {
    const successors = generateSuccessors(current);
    current = successors[pick % successors.length].state;
  }
  return current;
}

export const SCRAMBLED_STARTS: PuzzleState[] = [
  scramble(GOAL, [0, 2, 1, 0, 2, 1, 0, 3]),
  scramble(GOAL, [1, 1, 0, 2, 2, 0, 1, 1, 0, 2]),
  scramble(GOAL, [0, 0, 1, 2, 0, 0, 1, 2, 1, 0, 2, 0]),
];

export function labels(result: SearchResult): string[] {
  return result.moves.map(moveLabel);
}

export interface Settled {
  state: PuzzleState;
  cost: number;
}

/**
 * Exact cheapest cost to GOAL for every state within costLimit of it.
 * A move and its reverse slide the same tile, so costs are symmetric.
 */
export function costsToGoal(costLimit: number): Map<string, Settled> {
  const settled = new Map<string, Settled>();
  const queue = new PriorityQueue<Settled>();
  queue.push({ state: GOAL, cost: 0 }, 0);

  while (!queue.isEmpty()) {
    const entry = queue.pop();
    if (entry === undefined || entry.cost > costLimit) break;

    const key = stateKey(entry.state);
    if (settled.has(key)) continue;
    settled.set(key, entry);

    for (const { state, move } of generateSuccessors(entry.state)) {
      if (!settled.has(stateKey(state))) {
        const cost = entry.cost + move.cost;
        queue.push({ state, cost }, cost);
      }
    }
  }

  return settled;
}
