/**
 * Tests for the command-line entry point, run as a child process
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { spawnSync } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

const ROOT = fileURLToPath(new URL('../../', import.meta.url));
const START = 'tests/fixtures/start.txt';
const GOAL = 'tests/fixtures/goal.txt';

interface CliRun {
  status: number | null;
  stdout: string;
  stderr: string;
}

function runCli(args: string[], input = ''): CliRun {
  const result = spawnSync(process.execPath, ['--import', 'tsx', 'src/cli/index.ts', ...args], {
    cwd: ROOT,
    input,
    encoding: 'utf-8',
    timeout: 60000,
  });
  return { status: result.status, stdout: result.stdout, stderr: result.stderr };
}

// Method column of a comparison table
function comparedMethods(stdout: string): string[] {
  const lines = stdout.split('\n');
  const divider = lines.findIndex(line => line.startsWith('---'));
  assert.ok(divider > 0, 'comparison table not found');

  return lines
    .slice(divider + 1)
    .filter(line => line !== '')
    .map(line => line.split(/ {2,}/)[0]);
}

describe('CLI solve', () => {
  it('should print the solution and exit 0', () => {
    const run = runCli([START, GOAL]);

    assert.strictEqual(run.status, 0);
    assert.strictEqual(
      run.stdout,
      [
        'Nodes Popped: 3',
        'Nodes Expanded: 2',
        'Nodes Generated: 7',
        'Max Fringe Size: 5',
        'Solution Found at depth 2 with cost of 11.',
        'Steps:',
        '        Move 5 Left',
        '        Move 6 Up',
        '',
      ].join('\n')
    );
  });

  it('should print JSON on request', () => {
    const run = runCli([START, GOAL, 'ucs', '-f', 'json']);
    const parsed: unknown = JSON.parse(run.stdout);

    assert.strictEqual(run.status, 0);
    assert.ok(typeof parsed === 'object' && parsed !== null);
    assert.deepStrictEqual(Reflect.get(parsed, 'moves'), ['Move 5 Left', 'Move 6 Up']);
    assert.strictEqual(Reflect.get(parsed, 'cost'), 11);
  });

  it('should exit 1 when the depth limit cuts off the search', () => {
    const run = runCli([START, GOAL, 'dls', '1']);

    assert.strictEqual(run.status, 1);
    assert.strictEqual(
      run.stdout,
      [
        'Nodes Popped: 5',
        'Nodes Expanded: 1',
        'Nodes Generated: 4',
        'Max Fringe Size: 4',
        'No solution found (depth limit reached).',
        '',
      ].join('\n')
    );
  });

  it('should exit 1 for an unreachable goal', () => {
    const run = runCli(['tests/fixtures/unreachable.txt', GOAL]);

    assert.strictEqual(run.status, 1);
    assert.ok(
      run.stdout.endsWith('No solution found (goal is unreachable: start and goal have different parity).\n')
    );
  });

  it('should write a trace file with --dump', () => {
    const run = runCli([START, GOAL, '--dump']);
    const lines = run.stdout.trimEnd().split('\n');
    const match = /^Search trace written to (trace-[\d-]+\.txt)$/.exec(lines[lines.length - 1]);

    assert.strictEqual(run.status, 0);
    assert.ok(match !== null, 'trace file line missing');

    const traceFile = path.join(ROOT, match[1]);
    try {
      const firstLine = fs.readFileSync(traceFile, 'utf-8').split('\n')[0];
      assert.strictEqual(firstLine, `Command-Line Arguments: [${START}, ${GOAL}, --dump]`);
    } finally {
      fs.rmSync(traceFile, { force: true });
    }
  });

  it('should show help and exit 0', () => {
    const run = runCli(['--help']);

    assert.strictEqual(run.status, 0);
    assert.ok(run.stdout.includes('USAGE:'));
  });
});

describe('CLI depth limit prompt', () => {
  it('should read the DLS limit from stdin', () => {
    const run = runCli([START, GOAL, 'dls'], '2\n');

    assert.strictEqual(run.status, 0);
    assert.ok(run.stdout.startsWith('Enter depth limit for DLS: '));
    assert.ok(run.stdout.endsWith('        Move 5 Left\n        Move 6 Up\n'));
  });

  it('should exit 2 when DLS gets no limit', () => {
    const run = runCli([START, GOAL, 'dls']);

    assert.strictEqual(run.status, 2);
    assert.ok(run.stderr.includes('Error: No depth limit given'));
  });

  it('should compare without DLS when stdin is closed', () => {
    const run = runCli([START, GOAL, 'all']);

    assert.strictEqual(run.status, 0);
    assert.deepStrictEqual(comparedMethods(run.stdout), [
      'A*',
      'Greedy Best-First',
      'Uniform Cost',
      'Breadth-First',
      'Depth-First',
      'Iterative Deepening',
    ]);
  });

  it('should compare without DLS after an empty answer', () => {
    const run = runCli([START, GOAL, 'all'], '\n');

    assert.strictEqual(run.status, 0);
    assert.strictEqual(comparedMethods(run.stdout).length, 6);
  });

  it('should include DLS when the prompt gets a limit', () => {
    const run = runCli([START, GOAL, 'all'], '3\n');

    assert.strictEqual(run.status, 0);
    assert.deepStrictEqual(comparedMethods(run.stdout).slice(4), ['Depth-First', 'Depth-Limited', 'Iterative Deepening']);
  });
});

describe('CLI errors', () => {
  it('should exit 2 for a malformed puzzle file', () => {
    const run = runCli(['tests/fixtures/malformed.txt', GOAL]);

    assert.strictEqual(run.status, 2);
    assert.strictEqual(run.stdout, '');
    assert.ok(
      run.stderr.includes('Error: Malformed tests/fixtures/malformed.txt:\n  - line 3: expected 3 values, found 2')
    );
  });

  it('should exit 2 for an unknown method', () => {
    const run = runCli([START, GOAL, 'bogus']);

    assert.strictEqual(run.status, 2);
    assert.ok(run.stderr.includes('Run with --help for usage.'));
  });

  it('should exit 2 for a missing file', () => {
    const run = runCli(['tests/fixtures/missing.txt', GOAL]);

    assert.strictEqual(run.status, 2);
    assert.ok(run.stderr.includes('Error: Cannot read tests/fixtures/missing.txt: '));
  });
});
