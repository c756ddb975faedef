/**
 * Search tree nodes, stored in an arena and addressed by handle
 */

import type { Move, PuzzleState, Successor } from '../domain/types.js';
import { stateKey } from '../state/state-hash.js';

export const NO_PARENT = -1;

export interface SearchNode {
  state: PuzzleState;
  key: string;               // stateKey(state)
  parent: number;            // handle, NO_PARENT for the root
  move: Move | null;
  depth: number;
  cost: number;              // g(n) - cost from start
  heuristic: number | null;  // h(n), only computed by informed methods
}

/**
 * Owns every node created by one search. Parents are referenced by index,
 * so a path is rebuilt by walking handles back to the root.
 */
export class NodeArena {
  private nodes: SearchNode[] = [];

  createRoot(state: PuzzleState): number {
    return this.add({
      state,
      key: stateKey(state),
      parent: NO_PARENT,
      move: null,
      depth: 0,
      cost: 0,
      heuristic: null,
    });
  }

  createChild(parent: number, successor: Successor): number {
    const parentNode = this.get(parent);
    return this.add({
      state: successor.state,
      key: stateKey(successor.state),
      parent,
      move: successor.move,
      depth: parentNode.depth + 1,
      cost: parentNode.cost + successor.move.cost,
      heuristic: null,
    });
  }

  get(handle: number): SearchNode {
    if (handle < 0 || handle >= this.nodes.length) {
      throw new RangeError(`No search node with handle ${handle}`);
    }
    return this.nodes[handle];
  }

  size(): number {
    return this.nodes.length;
  }

  /**
   * Extract the moves and states from the root to this node
   */
  extractPath(handle: number): { moves: Move[]; states: PuzzleState[] } {
    const moves: Move[] = [];
    const states: PuzzleState[] = [];
    let current = handle;

    while (current !== NO_PARENT) {
      const node = this.get(current);
      states.push(node.state);
      if (node.move !== null) {
        moves.push(node.move);
      }
      current = node.parent;
    }

    return { moves: moves.reverse(), states: states.reverse() };
  }

  private add(node: SearchNode): number {
    this.nodes.push(node);
    return this.nodes.length - 1;
  }
}
