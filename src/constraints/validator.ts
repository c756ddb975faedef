/**
 * Validation of raw puzzle values
 */

import type { ValidationResult } from '../domain/types.js';
import { BLANK, CELL_COUNT } from '../domain/constants.js';

/**
 * Validate a candidate state: nine integers, each of 0-8 exactly once
 */
export function validateState(values: readonly number[]): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  // Check 1: Size
  if (values.length !== CELL_COUNT) {
    errors.push(`Expected ${CELL_COUNT} values, got ${values.length}`);
  }

  // Check 2: Range
  const seen = new Map<number, number>();
  for (const value of values) {
    if (!Number.isInteger(value) || value < 0 || value >= CELL_COUNT) {
      errors.push(`Value ${value} is outside 0-${CELL_COUNT - 1}`);
      continue;
    }
    seen.set(value, (seen.get(value) ?? 0) + 1);
  }

  // Check 3: Duplicates
  for (const [value, count] of seen) {
    if (count > 1) {
      errors.push(`Value ${value} appears ${count} times`);
    }
  }

  // Check 4: Blank present
  if (!seen.has(BLANK)) {
    errors.push('Missing blank (0)');
  }

  // Check 5: Missing tiles. Only worth reporting when nothing else explains it.
  if (errors.length === 0) {
    for (let tile = 1; tile < CELL_COUNT; tile++) {
      if (!seen.has(tile)) {
        errors.push(`Missing tile ${tile}`);
      }
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Validate a start/goal pair
 */
export function validateProblem(start: readonly number[], goal: readonly number[]): ValidationResult {
  const startCheck = validateState(start);
  const goalCheck = validateState(goal);

  const errors = [
    ...startCheck.errors.map(e => `start: ${e}`),
    ...goalCheck.errors.map(e => `goal: ${e}`),
  ];
  const warnings = [...startCheck.warnings, ...goalCheck.warnings];

  if (errors.length === 0 && start.every((value, i) => value === goal[i])) {
    warnings.push('Start state already equals the goal');
  }

  return { valid: errors.length === 0, errors, warnings };
}
