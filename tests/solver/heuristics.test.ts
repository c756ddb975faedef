/**
 * Tests for the weighted Manhattan heuristic
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createGoalIndex, createHeuristic, weightedManhattan } from '../../src/solver/heuristics.js';
import { generateSuccessors } from '../../src/solver/move-generator.js';
import { stateKey } from '../../src/state/state-hash.js';
import { createState } from '../../src/state/puzzle-state.js';
import { GOAL, ROUND_TRIP_START, UNREACHABLE_START, costsToGoal } from '../helpers.js';

describe('weightedManhattan', () => {
  const h = createHeuristic(GOAL);

  it('should be zero at the goal', () => {
    assert.strictEqual(h(GOAL), 0);
  });

  it('should weight each distance by the tile number', () => {
    // 5 and 6 are each one cell away
    assert.strictEqual(h(ROUND_TRIP_START), 11);
    assert.strictEqual(h(createState([1, 2, 3, 4, 5, 6, 7, 0, 8])), 8);
    assert.strictEqual(h(UNREACHABLE_START), 3);
  });

  it('should measure against the given goal', () => {
    const goalIndex = createGoalIndex(ROUND_TRIP_START);

    assert.deepStrictEqual(goalIndex[5], { row: 1, col: 2 });
    assert.strictEqual(weightedManhattan(GOAL, goalIndex), 11);
  });

  const exact = costsToGoal(40);

  it('should never overestimate the cheapest cost', () => {
    assert.ok(exact.size > 100);
    assert.strictEqual(exact.get(stateKey(ROUND_TRIP_START))?.cost, 11);

    for (const { state, cost } of exact.values()) {
      assert.ok(h(state) <= cost, `h(${stateKey(state)}) = ${h(state)} exceeds ${cost}`);
    }
  });

  it('should drop by at most the cost of any move', () => {
    for (const { state } of exact.values()) {
      for (const { state: next, move } of generateSuccessors(state)) {
        assert.ok(h(state) <= move.cost + h(next));
      }
    }
  });
});
