/**
 * Tests for move generation
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { countMoves, generateSuccessors } from '../../src/solver/move-generator.js';
import { applyMove, createState, findBlank } from '../../src/state/puzzle-state.js';
import { manhattanDistance, moveLabel, positionOf } from '../../src/domain/types.js';
import { GOAL, ROUND_TRIP_START, SCRAMBLED_STARTS } from '../helpers.js';

describe('generateSuccessors', () => {
  it('should try the blank up, down, left then right', () => {
    const successors = generateSuccessors(ROUND_TRIP_START);

    assert.deepStrictEqual(
      successors.map(s => moveLabel(s.move)),
      ['Move 2 Down', 'Move 8 Up', 'Move 4 Right', 'Move 5 Left']
    );
    assert.deepStrictEqual(
      successors.map(s => s.move.cost),
      [2, 8, 4, 5]
    );
  });

  it('should produce two moves from a corner', () => {
    const corner = createState([0, 1, 2, 3, 4, 5, 6, 7, 8]);
    const successors = generateSuccessors(corner);

    assert.deepStrictEqual(successors.map(s => moveLabel(s.move)), ['Move 3 Up', 'Move 1 Left']);
    assert.deepStrictEqual([...successors[0].state], [3, 1, 2, 0, 4, 5, 6, 7, 8]);
  });

  it('should produce three moves from an edge', () => {
    const edge = createState([1, 0, 2, 3, 4, 5, 6, 7, 8]);
    const successors = generateSuccessors(edge);

    assert.deepStrictEqual(
      successors.map(s => moveLabel(s.move)),
      ['Move 4 Up', 'Move 1 Right', 'Move 2 Left']
    );
  });

  it('should count moves by blank position', () => {
    assert.strictEqual(countMoves(GOAL), 2);
    assert.strictEqual(countMoves(createState([1, 0, 2, 3, 4, 5, 6, 7, 8])), 3);
    assert.strictEqual(countMoves(ROUND_TRIP_START), 4);
  });

  it('should only slide a neighbouring tile into the blank', () => {
    for (const state of [GOAL, ROUND_TRIP_START, ...SCRAMBLED_STARTS]) {
      const successors = generateSuccessors(state);
      assert.strictEqual(successors.length, countMoves(state));

      for (const { state: next, move } of successors) {
        const blankBefore = findBlank(state);
        const blankAfter = findBlank(next);

        assert.strictEqual(manhattanDistance(positionOf(blankBefore), positionOf(blankAfter)), 1);
        assert.strictEqual(next[blankBefore], move.tile);
        assert.strictEqual(move.cost, move.tile);
        assert.deepStrictEqual([...applyMove(state, move)], [...next]);
      }
    }
  });

  it('should not modify the input state', () => {
    const before = [...ROUND_TRIP_START];
    generateSuccessors(ROUND_TRIP_START);
    assert.deepStrictEqual([...ROUND_TRIP_START], before);
  });
});
