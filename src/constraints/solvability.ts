/**
 * Parity checks for reachability between two states
 */

import type { PuzzleState } from '../domain/types.js';
import { BLANK } from '../domain/constants.js';

/**
 * Number of tile pairs out of order, ignoring the blank
 */
export function countInversions(state: PuzzleState): number {
  const tiles = state.filter(value => value !== BLANK);
  let inversions = 0;

  for (let i = 0; i < tiles.length; i++) {
    for (let j = i + 1; j < tiles.length; j++) {
      if (tiles[i] > tiles[j]) inversions++;
    }
  }

  return inversions;
}

/**
 * 0 or 1. On an odd-width board a horizontal move keeps the tile order and a
 * vertical move shifts one tile past two others, so this never changes.
 */
export function inversionParity(state: PuzzleState): number {
  return countInversions(state) % 2;
}

/**
 * Check whether the goal lies in the same component as the start
 */
export function isSolvable(start: PuzzleState, goal: PuzzleState): boolean {
  return inversionParity(start) === inversionParity(goal);
}
