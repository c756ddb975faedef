#!/usr/bin/env node
/**
 * Expense 8-Puzzle Solver - CLI Interface
 */

import * as readline from 'readline';

import type { SearchOptions } from '../domain/types.js';
import { EXIT_CODES } from '../domain/constants.js';
import { PuzzleInputError, UsageError } from '../domain/errors.js';
import { PuzzleSolver } from '../solver/solver.js';
import { validateProblem } from '../constraints/validator.js';
import { loadPuzzleFile } from '../io/puzzle-parser.js';
import { formatComparison, formatSolution, formatSolutionJSON } from '../io/solution-formatter.js';
import { TraceWriter, traceFileName } from '../io/trace-writer.js';
import type { CLIOptions } from './args.js';
import { HELP_TEXT, exitCodeFor, parseArgs, parseDepthLimit } from './args.js';

// Parse command line arguments
const args = process.argv.slice(2);

function printHelp(): void {
  console.log(HELP_TEXT);
}

/**
 * Ask for a depth limit on stdin. An empty answer or closed input means no
 * limit, which is an error only when DLS is the method being run.
 */
async function promptDepthLimit(required: boolean): Promise<number | undefined> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  try {
    const answer = await new Promise<string | null>(resolve => {
      rl.once('close', () => resolve(null));
      rl.question('Enter depth limit for DLS: ', resolve);
    });

    if (answer === null || answer.trim() === '') {
      if (required) {
        throw new UsageError('No depth limit given');
      }
      return undefined;
    }
    return parseDepthLimit(answer);
  } finally {
    rl.close();
  }
}

async function runSolve(options: CLIOptions): Promise<number> {
  if (options.startFile === undefined || options.goalFile === undefined) {
    throw new UsageError('Expected <start_file> <goal_file>');
  }

  const start = loadPuzzleFile(options.startFile);
  const goal = loadPuzzleFile(options.goalFile);

  for (const warning of validateProblem(start, goal).warnings) {
    console.warn(`Warning: ${warning}`);
  }

  const runsDls = options.command === 'compare' || options.method === 'dls';
  const depthLimit =
    options.depthLimit ?? (runsDls ? await promptDepthLimit(options.command === 'solve') : undefined);

  const searchOptions: Partial<SearchOptions> = {
    depthLimit,
    maxDepth: options.maxDepth,
    maxNodes: options.maxNodes,
    maxTime: options.maxTime,
    checkParity: options.checkParity,
  };

  const solver = new PuzzleSolver();
  const tracer = options.dump ? new TraceWriter(traceFileName(), args) : null;
  let exitCode: number;

  try {
    if (options.command === 'compare') {
      const results = solver.compare(start, goal, searchOptions, undefined, tracer ?? undefined);
      console.log(options.outputFormat === 'json' ? formatSolutionJSON(results) : formatComparison(results));
      exitCode = results.some(result => result.found) ? EXIT_CODES.SUCCESS : EXIT_CODES.NO_SOLUTION;
    } else {
      const result = solver.solve(start, goal, options.method, searchOptions, tracer ?? undefined);
      console.log(options.outputFormat === 'json' ? formatSolutionJSON(result) : formatSolution(result));
      exitCode = result.found ? EXIT_CODES.SUCCESS : EXIT_CODES.NO_SOLUTION;
    }
  } finally {
    tracer?.close();
  }

  if (tracer !== null) {
    console.log(`Search trace written to ${tracer.filePath}`);
  }

  return exitCode;
}

// Main entry point
async function main(): Promise<number> {
  const options = parseArgs(args);

  switch (options.command) {
    case 'solve':
    case 'compare':
      return runSolve(options);

    case 'help':
    default:
      printHelp();
      return EXIT_CODES.SUCCESS;
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof PuzzleInputError || err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      if (err instanceof UsageError) {
        console.error('Run with --help for usage.');
      }
    } else {
      console.error('Error:', err);
    }
    process.exitCode = exitCodeFor(err);
  });
