/**
 * Generic search engine shared by all seven methods
 */

import type {
  PuzzleState,
  SearchMethod,
  SearchOptions,
  SearchOutcome,
  SearchResult,
  SearchStats,
} from '../domain/types.js';
import { createStats } from '../domain/types.js';
import { DEFAULT_SEARCH_OPTIONS } from '../domain/constants.js';
import { UsageError } from '../domain/errors.js';
import { stateKey } from '../state/state-hash.js';
import { NodeArena, NO_PARENT } from './search-node.js';
import { generateSuccessors } from './move-generator.js';
import { createHeuristic } from './heuristics.js';
import type { SearchPolicy } from './strategies.js';
import { SEARCH_POLICIES, VisitedStore, createFrontier } from './strategies.js';
import type { SearchTracer, TraceEntry } from './trace.js';
import type { Frontier } from './frontier.js';

export interface SearchProblem {
  start: PuzzleState;
  goal: PuzzleState;
}

// Caller-imposed limits, checked after each pop
export interface SearchBudget {
  maxNodes: number;
  deadline: number; // epoch ms
}

export interface SearchRun {
  outcome: SearchOutcome;
  goalHandle: number | null;
  arena: NodeArena;
  stats: SearchStats;
}

/**
 * Run one search with a single frontier and visited store.
 * DLS cuts off at depthLimit; every other method passes null.
 */
export function graphSearch(
  problem: SearchProblem,
  method: SearchMethod,
  depthLimit: number | null,
  budget: SearchBudget,
  tracer?: SearchTracer
): SearchRun {
  const policy = SEARCH_POLICIES[method];
  const goalKey = stateKey(problem.goal);
  const heuristic = policy.informed ? createHeuristic(problem.goal) : null;

  const arena = new NodeArena();
  const frontier = createFrontier<number>(policy.frontier);
  const visited = new VisitedStore(policy.visited);
  const stats = createStats();

  // Priority of a node, computing h(n) on first use
  const evaluate = (handle: number): number => {
    const node = arena.get(handle);
    if (heuristic !== null && node.heuristic === null) {
      node.heuristic = heuristic(node.state);
    }
    return policy.priority(node);
  };

  const root = arena.createRoot(problem.start);
  frontier.push(root, evaluate(root));
  stats.maxFringeSize = frontier.size();

  tracer?.onEvent({
    type: 'start',
    method,
    start: problem.start,
    goal: problem.goal,
    depthLimit,
    frontier: snapshot(frontier, arena, policy),
    stats: { ...stats },
  });

  let cutoff = false;
  let goalHandle: number | null = null;
  let outcome: SearchOutcome;

  while (true) {
    const handle = frontier.pop();
    if (handle === undefined) {
      outcome = cutoff ? 'DEPTH_EXCEEDED' : 'EXHAUSTED';
      break;
    }

    stats.nodesPopped++;
    const current = arena.get(handle);

    // Goal check
    if (current.key === goalKey) {
      outcome = 'SOLVED';
      goalHandle = handle;
      break;
    }

    // Check caller limits
    if (stats.nodesPopped >= budget.maxNodes || Date.now() > budget.deadline) {
      outcome = 'LIMIT_REACHED';
      break;
    }

    // Leaf at the depth limit
    if (depthLimit !== null && current.depth >= depthLimit) {
      cutoff = true;
      continue;
    }

    // Skip if already visited
    if (visited.has(current.key, current.cost, current.depth)) continue;
    visited.mark(current.key, current.cost, current.depth);

    const successors = generateSuccessors(current.state);
    stats.nodesGenerated += successors.length;

    let pushed = 0;
    for (const successor of successors) {
      const childKey = stateKey(successor.state);
      if (visited.has(childKey, current.cost + successor.move.cost, current.depth + 1)) {
        continue;
      }

      const child = arena.createChild(handle, successor);
      frontier.push(child, evaluate(child));
      pushed++;
    }

    stats.nodesExpanded++;
    stats.maxFringeSize = Math.max(stats.maxFringeSize, frontier.size());

    tracer?.onEvent({
      type: 'expand',
      method,
      node: toTraceEntry(arena, handle, policy),
      pushed,
      visitedCount: visited.size(),
      frontier: snapshot(frontier, arena, policy),
      stats: { ...stats },
    });
  }

  tracer?.onEvent({ type: 'finish', method, outcome, stats: { ...stats } });

  return { outcome, goalHandle, arena, stats };
}

/**
 * Depth-limited search with limits 0, 1, 2, ... up to maxDepth.
 * Counters are summed over iterations and the max fringe size is the
 * largest seen. Each restart regenerates the root, which is counted.
 */
export function iterativeDeepening(
  problem: SearchProblem,
  maxDepth: number,
  budget: SearchBudget,
  tracer?: SearchTracer
): SearchRun {
  const total = createStats();
  let last: SearchRun | null = null;

  for (let limit = 0; limit <= maxDepth; limit++) {
    if (total.nodesPopped >= budget.maxNodes) {
      return { outcome: 'LIMIT_REACHED', goalHandle: null, arena: new NodeArena(), stats: total };
    }

    const remaining = { ...budget, maxNodes: budget.maxNodes - total.nodesPopped };
    last = graphSearch(problem, 'ids', limit, remaining, tracer);

    if (limit > 0) total.nodesGenerated++;
    total.nodesPopped += last.stats.nodesPopped;
    total.nodesExpanded += last.stats.nodesExpanded;
    total.nodesGenerated += last.stats.nodesGenerated;
    total.maxFringeSize = Math.max(total.maxFringeSize, last.stats.maxFringeSize);

    // Solved, out of budget, or nothing was cut off so no deeper limit helps
    if (last.outcome !== 'DEPTH_EXCEEDED') {
      return { ...last, stats: total };
    }
  }

  // Iteration cap passed
  return {
    outcome: 'EXHAUSTED',
    goalHandle: null,
    arena: last?.arena ?? new NodeArena(),
    stats: total,
  };
}

/**
 * Search from start to goal with the chosen method
 */
export function search(
  problem: SearchProblem,
  method: SearchMethod,
  options: Partial<SearchOptions> = {},
  tracer?: SearchTracer
): SearchResult {
  const opts: SearchOptions = { ...DEFAULT_SEARCH_OPTIONS, ...options };
  const startTime = Date.now();
  const budget: SearchBudget = {
    maxNodes: opts.maxNodes,
    deadline: startTime + opts.maxTime,
  };

  let run: SearchRun;

  if (method === 'ids') {
    run = iterativeDeepening(problem, opts.maxDepth, budget, tracer);
  } else if (method === 'dls') {
    run = graphSearch(problem, method, requireDepthLimit(opts.depthLimit), budget, tracer);
  } else {
    run = graphSearch(problem, method, null, budget, tracer);
  }

  return buildResult(method, run, Date.now() - startTime);
}

/**
 * Validate the DLS depth limit
 */
export function requireDepthLimit(depthLimit: number | undefined): number {
  if (depthLimit === undefined) {
    throw new UsageError('Depth-limited search requires a depth limit');
  }
  if (!Number.isInteger(depthLimit) || depthLimit < 0) {
    throw new UsageError(`Depth limit must be a non-negative integer, got ${depthLimit}`);
  }
  return depthLimit;
}

/**
 * Build a SearchResult from a finished run
 */
function buildResult(method: SearchMethod, run: SearchRun, elapsedMs: number): SearchResult {
  if (run.goalHandle === null) {
    return {
      method,
      outcome: run.outcome,
      found: false,
      moves: [],
      states: [],
      cost: 0,
      depth: 0,
      stats: run.stats,
      elapsedMs,
      unsolvable: false,
    };
  }

  const goalNode = run.arena.get(run.goalHandle);
  const { moves, states } = run.arena.extractPath(run.goalHandle);

  return {
    method,
    outcome: run.outcome,
    found: true,
    moves,
    states,
    cost: goalNode.cost,
    depth: goalNode.depth,
    stats: run.stats,
    elapsedMs,
    unsolvable: false,
  };
}

function toTraceEntry(arena: NodeArena, handle: number, policy: SearchPolicy): TraceEntry {
  const node = arena.get(handle);
  return {
    state: node.state,
    move: node.move,
    cost: node.cost,
    depth: node.depth,
    heuristic: node.heuristic,
    priority: policy.priority(node),
    parent: node.parent === NO_PARENT ? null : arena.get(node.parent).state,
  };
}

function snapshot(frontier: Frontier<number>, arena: NodeArena, policy: SearchPolicy): TraceEntry[] {
  return frontier.toArray().map(handle => toTraceEntry(arena, handle, policy));
}
