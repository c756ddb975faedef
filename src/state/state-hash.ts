/**
 * State hashing for duplicate detection during search
 */

import type { PuzzleState } from '../domain/types.js';

/**
 * Create a hash string for a puzzle state.
 * Nine single digits, so equal states always map to equal keys.
 */
export function stateKey(state: PuzzleState): string {
  return state.join('');
}

