/**
 * Command-line argument parsing
 */

import type { SearchMethod } from '../domain/types.js';
import { DEFAULT_SEARCH_OPTIONS, EXIT_CODES } from '../domain/constants.js';
import { PuzzleInputError, UsageError } from '../domain/errors.js';
import { PuzzleSolver } from '../solver/solver.js';

export interface CLIOptions {
  command: 'solve' | 'compare' | 'help';
  startFile?: string;
  goalFile?: string;
  method: SearchMethod;
  depthLimit?: number;
  dump: boolean;
  outputFormat: 'text' | 'json';
  maxNodes: number;
  maxTime: number; // ms
  maxDepth: number;
  checkParity: boolean;
}

export const HELP_TEXT = `
Expense 8-Puzzle Solver
=======================

Solves the 3x3 sliding puzzle where moving a tile costs its number.

USAGE:
  expense-8-puzzle <start_file> <goal_file> [method] [depth_limit] [options]

METHODS (case-insensitive, default a*):
  a*, astar   A* search, f = g + h
  greedy      Greedy best-first, f = h
  ucs         Uniform cost search, f = g
  bfs         Breadth-first search
  dfs         Depth-first search
  dls         Depth-limited search (asks for a limit if none is given)
  ids         Iterative deepening search
  all         Run every method and print a comparison

OPTIONS:
  -d, --dump              Write a search trace to trace-<timestamp>.txt
  -f, --format <type>     Output format: text (default) or json
  --max-nodes <n>         Stop after popping n nodes
  -t, --time <seconds>    Stop after this much wall-clock time
  --max-depth <n>         Deepest limit tried by ids (default: ${DEFAULT_SEARCH_OPTIONS.maxDepth})
  --no-parity-check       Search even when the goal is unreachable
  -h, --help              Show help

PUZZLE FILE FORMAT:
  1 2 3
  4 0 5
  7 8 6
  END

EXIT CODES:
  0  solution found
  1  no solution found
  2  malformed input or bad usage
  3  internal error (for example, the trace file cannot be written)
`;

/**
 * Parse a depth limit: a non-negative integer
 */
export function parseDepthLimit(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new UsageError(`Depth limit must be a non-negative integer, got "${value}"`);
  }
  return parseInt(trimmed, 10);
}

function parsePositive(flag: string, value: string | undefined): number {
  if (value === undefined) {
    throw new UsageError(`${flag} needs a value`);
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new UsageError(`${flag} must be a positive number, got "${value}"`);
  }
  return parsed;
}

function parseCount(flag: string, value: string | undefined): number {
  const parsed = parsePositive(flag, value);
  if (!Number.isInteger(parsed)) {
    throw new UsageError(`${flag} must be a whole number, got "${value}"`);
  }
  return parsed;
}

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'solve',
    method: 'a*',
    dump: false,
    outputFormat: 'text',
    maxNodes: DEFAULT_SEARCH_OPTIONS.maxNodes,
    maxTime: DEFAULT_SEARCH_OPTIONS.maxTime,
    maxDepth: DEFAULT_SEARCH_OPTIONS.maxDepth,
    checkParity: DEFAULT_SEARCH_OPTIONS.checkParity,
  };
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-d':
      case '--dump':
        options.dump = true;
        break;

      case '-f':
      case '--format': {
        const format = args[++i];
        if (format !== 'text' && format !== 'json') {
          throw new UsageError(`--format must be text or json, got "${format ?? ''}"`);
        }
        options.outputFormat = format;
        break;
      }

      case '--max-nodes':
        options.maxNodes = parseCount(arg, args[++i]);
        break;

      case '-t':
      case '--time':
        options.maxTime = parsePositive(arg, args[++i]) * 1000;
        break;

      case '--max-depth':
        options.maxDepth = parseCount(arg, args[++i]);
        break;

      case '--no-parity-check':
        options.checkParity = false;
        break;

      case '-h':
      case '--help':
        options.command = 'help';
        return options;

      default:
        if (arg.startsWith('-') && arg.length > 1) {
          throw new UsageError(`Unknown option "${arg}"`);
        }
        positionals.push(arg);
    }
  }

  if (positionals.length === 0) {
    options.command = 'help';
    return options;
  }

  if (positionals.length < 2) {
    throw new UsageError('Expected <start_file> <goal_file>');
  }

  if (positionals.length > 4) {
    throw new UsageError(`Unexpected argument "${positionals[4]}"`);
  }

  const [startFile, goalFile, method, depthLimit] = positionals;
  options.startFile = startFile;
  options.goalFile = goalFile;

  if (method !== undefined) {
    if (method.toLowerCase() === 'all') {
      options.command = 'compare';
    } else {
      options.method = PuzzleSolver.parseMethod(method);
    }
  }

  if (depthLimit !== undefined) {
    options.depthLimit = parseDepthLimit(depthLimit);
  }

  return options;
}

/**
 * Exit code for an error that ended the run
 */
export function exitCodeFor(err: unknown): number {
  if (err instanceof PuzzleInputError || err instanceof UsageError) {
    return EXIT_CODES.BAD_INPUT;
  }
  return EXIT_CODES.INTERNAL_ERROR;
}
