/**
 * Puzzle state representation and management
 */

import type { Move, Position, PuzzleState } from '../domain/types.js';
import { indexOf, positionOf } from '../domain/types.js';
import { BLANK, DIRECTION_OFFSETS, GRID_SIZE } from '../domain/constants.js';
import { PuzzleInputError } from '../domain/errors.js';
import { validateState } from '../constraints/validator.js';

/**
 * Create an immutable state from nine values
 */
export function createState(values: readonly number[]): PuzzleState {
  const validation = validateState(values);
  if (!validation.valid) {
    throw new PuzzleInputError('Invalid puzzle state', validation.errors);
  }
  return Object.freeze([...values]);
}

/**
 * Index of the blank
 */
export function findBlank(state: PuzzleState): number {
  return state.indexOf(BLANK);
}

export function isInsideGrid(position: Position): boolean {
  return position.row >= 0 && position.row < GRID_SIZE && position.col >= 0 && position.col < GRID_SIZE;
}

export function statesEqual(a: PuzzleState, b: PuzzleState): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Return a new state with two cells swapped
 */
export function swapCells(state: PuzzleState, i: number, j: number): PuzzleState {
  const next = [...state];
  next[i] = state[j];
  next[j] = state[i];
  return Object.freeze(next);
}

/**
 * Replay a labelled move. Throws if the tile cannot slide that way.
 */
export function applyMove(state: PuzzleState, move: Move): PuzzleState {
  const tileIndex = state.indexOf(move.tile);
  if (move.tile === BLANK || tileIndex < 0) {
    throw new Error(`Tile ${move.tile} is not on the board`);
  }

  const from = positionOf(tileIndex);
  const offset = DIRECTION_OFFSETS[move.direction];
  const target = { row: from.row + offset.row, col: from.col + offset.col };

  if (!isInsideGrid(target) || state[indexOf(target)] !== BLANK) {
    throw new Error(`Tile ${move.tile} cannot move ${move.direction}`);
  }

  return swapCells(state, tileIndex, indexOf(target));
}

/**
 * Replay a sequence of moves from a start state
 */
export function replayMoves(start: PuzzleState, moves: readonly Move[]): PuzzleState {
  let state = start;
  for (const move of moves) {
    state = applyMove(state, move);
  }
  return state;
}

/**
 * Split a state into its three rows
 */
export function toRows(state: PuzzleState): number[][] {
  const rows: number[][] = [];
  for (let row = 0; row < GRID_SIZE; row++) {
    rows.push(state.slice(row * GRID_SIZE, (row + 1) * GRID_SIZE));
  }
  return rows;
}
