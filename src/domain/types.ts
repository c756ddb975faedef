/**
 * Core type definitions for the expense 8-puzzle solver
 */

// Row-major 3x3 grid, 0 is the blank
export type PuzzleState = readonly number[];

// Direction a tile slides into the blank
export type Direction = 'Up' | 'Down' | 'Left' | 'Right';

// Search strategies
export type SearchMethod = 'a*' | 'greedy' | 'ucs' | 'bfs' | 'dfs' | 'dls' | 'ids';

// Terminal states of a search run
export type SearchOutcome = 'SOLVED' | 'EXHAUSTED' | 'DEPTH_EXCEEDED' | 'LIMIT_REACHED';

// Grid position
export interface Position {
  row: number; // 0-2
  col: number; // 0-2
}

// A single tile move; cost equals the tile number
export interface Move {
  tile: number;
  direction: Direction;
  cost: number;
}

// Successor produced by the move generator
export interface Successor {
  state: PuzzleState;
  move: Move;
}

// Validation result
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// Search statistics, owned by one search invocation
export interface SearchStats {
  nodesPopped: number;
  nodesExpanded: number;
  nodesGenerated: number;
  maxFringeSize: number;
}

// Search options
export interface SearchOptions {
  depthLimit?: number; // required by DLS
  maxDepth: number;    // IDS iteration cap
  maxNodes: number;    // budget on nodes popped
  maxTime: number;     // budget in ms
  checkParity: boolean;
}

// Complete search result
export interface SearchResult {
  method: SearchMethod;
  outcome: SearchOutcome;
  found: boolean;
  moves: Move[];
  states: PuzzleState[]; // start to goal, inclusive
  cost: number;
  depth: number;
  stats: SearchStats;
  elapsedMs: number;
  unsolvable: boolean; // rejected by the parity pre-check
}

export function positionOf(index: number): Position {
  return { row: Math.floor(index / 3), col: index % 3 };
}

export function indexOf(position: Position): number {
  return position.row * 3 + position.col;
}

export function manhattanDistance(a: Position, b: Position): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

export function moveLabel(move: Move): string {
  return `Move ${move.tile} ${move.direction}`;
}

export function createStats(): SearchStats {
  return {
    nodesPopped: 0,
    nodesExpanded: 0,
    nodesGenerated: 0,
    maxFringeSize: 0,
  };
}
