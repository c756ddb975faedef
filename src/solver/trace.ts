/**
 * Events emitted by the search engine for trace dumps
 */

import type { Move, PuzzleState, SearchMethod, SearchOutcome, SearchStats } from '../domain/types.js';

// A node as it appears in a trace
export interface TraceEntry {
  state: PuzzleState;
  move: Move | null;
  cost: number;
  depth: number;
  heuristic: number | null;
  priority: number;
  parent: PuzzleState | null;
}

export type SearchEvent =
  | {
      type: 'start';
      method: SearchMethod;
      start: PuzzleState;
      goal: PuzzleState;
      depthLimit: number | null;
      frontier: TraceEntry[];
      stats: SearchStats;
    }
  | {
      type: 'expand';
      method: SearchMethod;
      node: TraceEntry;
      pushed: number;
      visitedCount: number;
      frontier: TraceEntry[];
      stats: SearchStats;
    }
  | {
      type: 'finish';
      method: SearchMethod;
      outcome: SearchOutcome;
      stats: SearchStats;
    };

export interface SearchTracer {
  onEvent(event: SearchEvent): void;
}
