/**
 * Constants for the expense 8-puzzle solver
 */

import type { Direction, SearchMethod } from './types.js';

// Grid dimensions
export const GRID_SIZE = 3;
export const CELL_COUNT = GRID_SIZE * GRID_SIZE;

export const BLANK = 0;

// Order in which the blank's neighbours are tried. This fixes tie-breaking
// for equal-priority pops and which solution DFS and Greedy find first.
export const BLANK_DIRECTIONS: readonly Direction[] = ['Up', 'Down', 'Left', 'Right'];

// Row/column offsets of the blank's neighbour, per direction
export const DIRECTION_OFFSETS: Record<Direction, { row: number; col: number }> = {
  Up: { row: -1, col: 0 },
  Down: { row: 1, col: 0 },
  Left: { row: 0, col: -1 },
  Right: { row: 0, col: 1 },
};

// The tile moves opposite to the blank
export const OPPOSITE_DIRECTION: Record<Direction, Direction> = {
  Up: 'Down',
  Down: 'Up',
  Left: 'Right',
  Right: 'Left',
};

export const SEARCH_METHODS: readonly SearchMethod[] = [
  'a*',
  'greedy',
  'ucs',
  'bfs',
  'dfs',
  'dls',
  'ids',
];

export const METHOD_NAMES: Record<SearchMethod, string> = {
  'a*': 'A*',
  greedy: 'Greedy Best-First',
  ucs: 'Uniform Cost',
  bfs: 'Breadth-First',
  dfs: 'Depth-First',
  dls: 'Depth-Limited',
  ids: 'Iterative Deepening',
};

// Accepted spellings on the command line (matched lower-cased)
export const METHOD_ALIASES: Record<string, SearchMethod> = {
  'a*': 'a*',
  astar: 'a*',
  greedy: 'greedy',
  ucs: 'ucs',
  bfs: 'bfs',
  dfs: 'dfs',
  dls: 'dls',
  ids: 'ids',
};

// Default search options
export const DEFAULT_SEARCH_OPTIONS = {
  maxDepth: 50,
  maxNodes: Infinity,
  maxTime: Infinity,
  checkParity: true,
};

export const PUZZLE_TERMINATOR = 'END';

export const EXIT_CODES = {
  SUCCESS: 0,
  NO_SOLUTION: 1,
  BAD_INPUT: 2,
  INTERNAL_ERROR: 3,
};
