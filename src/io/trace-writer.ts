/**
 * Write search traces to a dump file
 */

import * as fs from 'fs';
import type { PuzzleState, SearchStats } from '../domain/types.js';
import { moveLabel } from '../domain/types.js';
import { toRows } from '../state/puzzle-state.js';
import type { SearchEvent, SearchTracer, TraceEntry } from '../solver/trace.js';
import { formatStats } from './solution-formatter.js';

const SEPARATOR = '-'.repeat(60);

/**
 * Default dump file name: trace-YYYY-MM-DD-HH-MM-SS.txt
 */
export function traceFileName(date: Date = new Date()): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  const stamp = [
    date.getFullYear(),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ].join('-');
  return `trace-${stamp}.txt`;
}

export function formatStateInline(state: PuzzleState): string {
  return `[${toRows(state).map(row => `[${row.join(', ')}]`).join(', ')}]`;
}

/**
 * Format a traced node
 */
export function formatTraceEntry(entry: TraceEntry): string {
  const action = entry.move === null ? 'Start' : moveLabel(entry.move);
  const parts = [
    `state = ${formatStateInline(entry.state)}`,
    `action = {${action}}`,
    `g(n) = ${entry.cost}`,
    `d = ${entry.depth}`,
  ];

  if (entry.heuristic !== null) {
    parts.push(`h(n) = ${entry.heuristic}`);
  }

  parts.push(`f(n) = ${entry.priority}`);
  parts.push(`parent = ${entry.parent === null ? 'none' : formatStateInline(entry.parent)}`);

  return `< ${parts.join(', ')} >`;
}

function formatSnapshot(frontier: TraceEntry[], stats: SearchStats): string[] {
  return [
    '\tFringe: [',
    ...frontier.map(entry => `\t\t${formatTraceEntry(entry)}`),
    '\t]',
    ...formatStats(stats).split('\n').map(line => `\t${line}`),
    SEPARATOR,
  ];
}

/**
 * Lines written for one engine event
 */
export function formatEvent(event: SearchEvent): string[] {
  switch (event.type) {
    case 'start': {
      const label = event.depthLimit === null ? event.method : `${event.method}(limit=${event.depthLimit})`;
      return [
        `Running ${label}`,
        `Start: ${formatStateInline(event.start)}`,
        `Goal: ${formatStateInline(event.goal)}`,
        'After Initialization',
        ...formatSnapshot(event.frontier, event.stats),
      ];
    }

    case 'expand':
      return [
        `Generating successors to ${formatTraceEntry(event.node)}:`,
        `\t${event.pushed} successors generated`,
        `\tClosed: ${event.visitedCount} states`,
        ...formatSnapshot(event.frontier, event.stats),
      ];

    case 'finish':
      return [
        `Finished ${event.method}: ${event.outcome}`,
        ...formatStats(event.stats).split('\n').map(line => `\t${line}`),
      ];
  }
}

/**
 * Tracer that writes every event to a file as it happens
 */
export class TraceWriter implements SearchTracer {
  private fd: number | null;

  constructor(readonly filePath: string, commandArgs: string[]) {
    this.fd = fs.openSync(filePath, 'w');
    this.writeLines([`Command-Line Arguments: [${commandArgs.join(', ')}]`]);
  }

  onEvent(event: SearchEvent): void {
    this.writeLines(formatEvent(event));
  }

  close(): void {
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
    }
  }

  private writeLines(lines: string[]): void {
    if (this.fd === null) {
      throw new Error(`Trace file ${this.filePath} is already closed`);
    }
    fs.writeSync(this.fd, lines.join('\n') + '\n');
  }
}
