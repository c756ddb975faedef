/**
 * Parse puzzle states from the text file format
 *
 * Format:
 * ```
 * 1 2 3
 * 4 0 5
 * 7 8 6
 * END
 * ```
 * Blank lines are ignored, as is anything after END.
 */

import * as fs from 'fs';
import type { PuzzleState } from '../domain/types.js';
import { GRID_SIZE, PUZZLE_TERMINATOR } from '../domain/constants.js';
import { PuzzleInputError } from '../domain/errors.js';
import { validateState } from '../constraints/validator.js';
import { toRows } from '../state/puzzle-state.js';

const INTEGER_TOKEN = /^[+-]?\d+$/;

/**
 * Parse puzzle text into a state
 */
export function parsePuzzleText(text: string, source = 'puzzle'): PuzzleState {
  const problems: string[] = [];
  const rows: number[][] = [];
  let terminated = false;

  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    const lineNumber = i + 1;

    if (line === '') continue;

    if (line === PUZZLE_TERMINATOR) {
      terminated = true;
      break;
    }

    const tokens = line.split(/\s+/);
    const row: number[] = [];

    for (const token of tokens) {
      if (!INTEGER_TOKEN.test(token)) {
        problems.push(`line ${lineNumber}: "${token}" is not an integer`);
        continue;
      }
      row.push(parseInt(token, 10));
    }

    if (tokens.length !== GRID_SIZE) {
      problems.push(`line ${lineNumber}: expected ${GRID_SIZE} values, found ${tokens.length}`);
    }

    rows.push(row);
  }

  if (!terminated) {
    problems.push(`missing "${PUZZLE_TERMINATOR}" line`);
  }

  if (rows.length !== GRID_SIZE) {
    problems.push(`expected ${GRID_SIZE} rows before "${PUZZLE_TERMINATOR}", found ${rows.length}`);
  }

  if (problems.length > 0) {
    throw new PuzzleInputError(`Malformed ${source}`, problems);
  }

  const values = rows.flat();
  const validation = validateState(values);

  if (!validation.valid) {
    throw new PuzzleInputError(`Invalid ${source}`, validation.errors);
  }

  return Object.freeze(values);
}

/**
 * Load a puzzle state from a file
 */
export function loadPuzzleFile(filePath: string): PuzzleState {
  let content: string;

  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PuzzleInputError(`Cannot read ${filePath}: ${reason}`);
  }

  return parsePuzzleText(content, filePath);
}

/**
 * Export a state in the file format
 */
export function formatPuzzleText(state: PuzzleState): string {
  const lines = toRows(state).map(row => row.join(' '));
  lines.push(PUZZLE_TERMINATOR);
  return lines.join('\n') + '\n';
}
