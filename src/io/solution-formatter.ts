/**
 * Format search results for human-readable output
 */

import type { PuzzleState, SearchResult, SearchStats } from '../domain/types.js';
import { moveLabel } from '../domain/types.js';
import { BLANK, METHOD_NAMES } from '../domain/constants.js';
import { toRows } from '../state/puzzle-state.js';

const STEP_INDENT = '        ';

/**
 * Format a complete result for console output
 */
export function formatSolution(result: SearchResult): string {
  const lines: string[] = [formatStats(result.stats)];

  if (!result.found) {
    lines.push(`No solution found (${describeFailure(result)}).`);
    return lines.join('\n');
  }

  lines.push(`Solution Found at depth ${result.depth} with cost of ${result.cost}.`);
  lines.push('Steps:');
  for (const move of result.moves) {
    lines.push(`${STEP_INDENT}${moveLabel(move)}`);
  }

  return lines.join('\n');
}

/**
 * Format search statistics
 */
export function formatStats(stats: SearchStats): string {
  return [
    `Nodes Popped: ${stats.nodesPopped}`,
    `Nodes Expanded: ${stats.nodesExpanded}`,
    `Nodes Generated: ${stats.nodesGenerated}`,
    `Max Fringe Size: ${stats.maxFringeSize}`,
  ].join('\n');
}

/**
 * Why a search ended without a solution
 */
export function describeFailure(result: SearchResult): string {
  if (result.unsolvable) {
    return 'goal is unreachable: start and goal have different parity';
  }

  switch (result.outcome) {
    case 'DEPTH_EXCEEDED':
      return 'depth limit reached';
    case 'LIMIT_REACHED':
      return 'search budget reached';
    default:
      return 'search space exhausted';
  }
}

/**
 * Format a state as an ASCII grid, blank shown empty
 */
export function formatGrid(state: PuzzleState): string {
  const border = '+---+---+---+';
  const lines: string[] = [border];

  for (const row of toRows(state)) {
    const cells = row.map(value => (value === BLANK ? ' ' : String(value)));
    lines.push(`| ${cells.join(' | ')} |`);
    lines.push(border);
  }

  return lines.join('\n');
}

/**
 * Format one row per method for side-by-side comparison
 */
export function formatComparison(results: SearchResult[]): string {
  const header = ['Method', 'Outcome', 'Popped', 'Expanded', 'Generated', 'Max Fringe', 'Depth', 'Cost'];
  const rows = results.map(result => [
    METHOD_NAMES[result.method],
    result.unsolvable ? 'UNSOLVABLE' : result.outcome,
    String(result.stats.nodesPopped),
    String(result.stats.nodesExpanded),
    String(result.stats.nodesGenerated),
    String(result.stats.maxFringeSize),
    result.found ? String(result.depth) : '-',
    result.found ? String(result.cost) : '-',
  ]);

  const widths = header.map((title, col) => Math.max(title.length, ...rows.map(row => row[col].length)));
  const formatRow = (cells: string[]): string =>
    cells
      .map((cell, col) => (col < 2 ? cell.padEnd(widths[col]) : cell.padStart(widths[col])))
      .join('  ')
      .trimEnd();

  return [
    formatRow(header),
    widths.map(width => '-'.repeat(width)).join('  '),
    ...rows.map(formatRow),
  ].join('\n');
}

/**
 * Plain-object view of a result for JSON output
 */
export function solutionToJSON(result: SearchResult): Record<string, unknown> {
  return {
    method: result.method,
    outcome: result.outcome,
    found: result.found,
    unsolvable: result.unsolvable,
    depth: result.depth,
    cost: result.cost,
    stats: result.stats,
    elapsedMs: result.elapsedMs,
    moves: result.moves.map(moveLabel),
  };
}

/**
 * Format one result, or a comparison, as JSON
 */
export function formatSolutionJSON(result: SearchResult | SearchResult[]): string {
  const payload = Array.isArray(result) ? result.map(solutionToJSON) : solutionToJSON(result);
  return JSON.stringify(payload, null, 2);
}
