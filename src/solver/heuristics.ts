/**
 * Heuristic functions for informed search
 */

import type { Position, PuzzleState } from '../domain/types.js';
import { manhattanDistance, positionOf } from '../domain/types.js';
import { BLANK, CELL_COUNT } from '../domain/constants.js';

// Goal position of each tile, indexed by tile number
export type GoalIndex = readonly Position[];

/**
 * Precompute where every tile sits in the goal
 */
export function createGoalIndex(goal: PuzzleState): GoalIndex {
  const index: Position[] = new Array<Position>(CELL_COUNT);
  goal.forEach((tile, cell) => {
    index[tile] = positionOf(cell);
  });
  return index;
}

/**
 * Weighted Manhattan distance: each tile's distance to its goal cell,
 * multiplied by the tile number. A move of tile t costs t and changes only
 * t's distance, by one, so h drops by at most the cost of any move.
 */
export function weightedManhattan(state: PuzzleState, goalIndex: GoalIndex): number {
  let h = 0;

  for (let cell = 0; cell < state.length; cell++) {
    const tile = state[cell];
    if (tile === BLANK) continue;
    h += tile * manhattanDistance(positionOf(cell), goalIndex[tile]);
  }

  return h;
}

/**
 * Bind the heuristic to a goal
 */
export function createHeuristic(goal: PuzzleState): (state: PuzzleState) => number {
  const goalIndex = createGoalIndex(goal);
  return state => weightedManhattan(state, goalIndex);
}
