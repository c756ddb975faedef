/**
 * Per-method search policies
 */

import type { SearchMethod } from '../domain/types.js';
import type { Frontier } from './frontier.js';
import { FifoQueue, LifoStack, PriorityQueue } from './frontier.js';
import type { SearchNode } from './search-node.js';

export type FrontierKind = 'PRIORITY' | 'FIFO' | 'LIFO';

// What makes a state count as already visited
//   STATE - seen at all
//   COST  - seen with cost <= this node's cost
//   DEPTH - seen at the same or a shallower depth
export type VisitedPolicy = 'STATE' | 'COST' | 'DEPTH';

export interface SearchPolicy {
  frontier: FrontierKind;
  visited: VisitedPolicy;
  informed: boolean;            // computes h(n)
  priority: (node: SearchNode) => number;
}

const byDepth = (node: SearchNode): number => node.depth;
const byHeuristic = (node: SearchNode): number => node.heuristic ?? 0;

export const SEARCH_POLICIES: Record<SearchMethod, SearchPolicy> = {
  'a*': {
    frontier: 'PRIORITY',
    visited: 'COST',
    informed: true,
    priority: node => node.cost + byHeuristic(node),
  },
  greedy: {
    frontier: 'PRIORITY',
    visited: 'STATE',
    informed: true,
    priority: byHeuristic,
  },
  ucs: {
    frontier: 'PRIORITY',
    visited: 'COST',
    informed: false,
    priority: node => node.cost,
  },
  bfs: {
    frontier: 'FIFO',
    visited: 'STATE',
    informed: false,
    priority: byDepth,
  },
  dfs: {
    frontier: 'LIFO',
    visited: 'STATE',
    informed: false,
    priority: byDepth,
  },
  dls: {
    frontier: 'LIFO',
    visited: 'DEPTH',
    informed: false,
    priority: byDepth,
  },
  // Each iteration of IDS is a DLS run
  ids: {
    frontier: 'LIFO',
    visited: 'DEPTH',
    informed: false,
    priority: byDepth,
  },
};

export function createFrontier<T>(kind: FrontierKind): Frontier<T> {
  switch (kind) {
    case 'PRIORITY':
      return new PriorityQueue<T>();
    case 'FIFO':
      return new FifoQueue<T>();
    case 'LIFO':
      return new LifoStack<T>();
  }
}

/**
 * States already expanded in one search run
 */
export class VisitedStore {
  // state key -> cost or depth at which it was expanded
  private seen = new Map<string, number>();

  constructor(private readonly policy: VisitedPolicy) {}

  has(key: string, cost: number, depth: number): boolean {
    const recorded = this.seen.get(key);
    if (recorded === undefined) return false;

    switch (this.policy) {
      case 'STATE':
        return true;
      case 'COST':
        return recorded <= cost;
      case 'DEPTH':
        return recorded <= depth;
    }
  }

  mark(key: string, cost: number, depth: number): void {
    this.seen.set(key, this.policy === 'DEPTH' ? depth : cost);
  }

  size(): number {
    return this.seen.size;
  }
}
