/**
 * Generate legal moves from a puzzle state
 */

import type { PuzzleState, Successor } from '../domain/types.js';
import { indexOf, positionOf } from '../domain/types.js';
import { BLANK_DIRECTIONS, DIRECTION_OFFSETS, OPPOSITE_DIRECTION } from '../domain/constants.js';
import { findBlank, isInsideGrid, swapCells } from '../state/puzzle-state.js';

/**
 * All successors of a state, in BLANK_DIRECTIONS order.
 * The blank swaps with its neighbour; the label and cost describe the tile
 * that slid into the blank, moving opposite to the blank.
 */
export function generateSuccessors(state: PuzzleState): Successor[] {
  const successors: Successor[] = [];
  const blankIndex = findBlank(state);
  const blank = positionOf(blankIndex);

  for (const blankDirection of BLANK_DIRECTIONS) {
    const offset = DIRECTION_OFFSETS[blankDirection];
    const neighbour = { row: blank.row + offset.row, col: blank.col + offset.col };

    if (!isInsideGrid(neighbour)) {
      continue;
    }

    const neighbourIndex = indexOf(neighbour);
    const tile = state[neighbourIndex];

    successors.push({
      state: swapCells(state, blankIndex, neighbourIndex),
      move: {
        tile,
        direction: OPPOSITE_DIRECTION[blankDirection],
        cost: tile,
      },
    });
  }

  return successors;
}

/**
 * Number of legal moves: 2 in a corner, 3 on an edge, 4 in the centre
 */
export function countMoves(state: PuzzleState): number {
  const blank = positionOf(findBlank(state));
  let count = 0;

  for (const direction of BLANK_DIRECTIONS) {
    const offset = DIRECTION_OFFSETS[direction];
    if (isInsideGrid({ row: blank.row + offset.row, col: blank.col + offset.col })) {
      count++;
    }
  }

  return count;
}
