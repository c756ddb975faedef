/**
 * Error types raised before a search starts
 */

/**
 * A puzzle file or state that cannot be used as input
 */
export class PuzzleInputError extends Error {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    const detail = problems.length > 0 ? `${message}:\n${problems.map(p => `  - ${p}`).join('\n')}` : message;
    super(detail);
    this.name = 'PuzzleInputError';
    this.problems = problems;
  }
}

/**
 * Bad command-line usage: unknown method, missing or invalid depth limit
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
