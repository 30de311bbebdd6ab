import type { ConflictDetector } from '../conflicts/resources.js';
import { getDependencies, getDependents } from '../graph/builder.js';
import { computeDepths, computeHeights } from '../graph/topo-sort.js';
import type { DependencyGraph, OrderingStrategyName, ReadySet } from '../types/index.js';
import type { TaskHeuristics } from './heuristics.js';

export interface StrategyContext {
  graph: DependencyGraph;
  heuristics: TaskHeuristics;
  conflicts: ConflictDetector | null; // null when conflict detection is off
}

export interface OrderingStrategy {
  readonly name: OrderingStrategyName;
  reorder(readySets: readonly ReadySet[], context: StrategyContext): ReadySet[];
}

/**
 * Error thrown when a strategy emits an order that breaks the dependency
 * partial order. Indicates a bug in the strategy, not bad input.
 */
export class StrategyInvariantError extends Error {
  constructor(
    public readonly strategy: OrderingStrategyName,
    public readonly taskId: string,
    detail: string
  ) {
    super(`Strategy ${strategy} produced an invalid order at task ${taskId}: ${detail}`);
    this.name = 'StrategyInvariantError';
  }
}

export function toReadySets(layers: readonly string[][]): ReadySet[] {
  return layers.map((taskIds): ReadySet => ({ taskIds: [...taskIds], basis: { kind: 'dependencies' } }));
}

/**
 * Step-by-step list scheduling over the tasks of the given ready sets.
 * Each step hands `pick` every unscheduled task whose dependencies are all
 * scheduled (in ready-set order) and emits the non-empty set it returns.
 */
function scheduleStepwise(
  readySets: readonly ReadySet[],
  graph: DependencyGraph,
  pick: (ready: string[]) => ReadySet
): ReadySet[] {
  const position = new Map<string, number>();
  for (const set of readySets) {
    for (const id of set.taskIds) {
      if (!position.has(id)) position.set(id, position.size);
    }
  }
  const byPosition = (a: string, b: string) => (position.get(a) ?? 0) - (position.get(b) ?? 0);

  // Unscheduled dependency count per task
  const remaining = new Map<string, number>();
  for (const id of position.keys()) {
    let count = 0;
    for (const dep of getDependencies(graph, id)) {
      if (position.has(dep)) count++;
    }
    remaining.set(id, count);
  }

  let ready = Array.from(position.keys()).filter((id) => remaining.get(id) === 0);
  const result: ReadySet[] = [];

  while (ready.length > 0) {
    const next = pick([...ready]);
    const chosen = new Set(next.taskIds);
    if (chosen.size === 0) break;
    result.push(next);

    const unlocked: string[] = [];
    for (const id of chosen) {
      for (const dependent of getDependents(graph, id)) {
        const count = remaining.get(dependent);
        if (count === undefined) continue;
        remaining.set(dependent, count - 1);
        if (count === 1) unlocked.push(dependent);
      }
    }
    ready = ready.filter((id) => !chosen.has(id)).concat(unlocked).sort(byPosition);
  }

  return result;
}

const topological: OrderingStrategy = {
  name: 'topological',
  reorder: (readySets) =>
    readySets.map((set): ReadySet => ({ taskIds: [...set.taskIds], basis: set.basis })),
};

const riskFirst: OrderingStrategy = {
  name: 'risk_first',
  reorder: (readySets, { graph, heuristics }) =>
    scheduleStepwise(readySets, graph, (ready) => {
      const classOf = (id: string): number => {
        const task = graph.tasks.get(id);
        return task ? heuristics.priorityClass(task) : Number.POSITIVE_INFINITY;
      };
      const priority = ready.reduce((min, id) => Math.min(min, classOf(id)), Number.POSITIVE_INFINITY);
      return {
        taskIds: ready.filter((id) => classOf(id) === priority),
        basis: { kind: 'priority', priority },
      };
    }),
};

const foundationalFirst: OrderingStrategy = {
  name: 'foundational_first',
  reorder: (readySets, { graph, heuristics }) =>
    scheduleStepwise(readySets, graph, (ready) => {
      const reasons = new Set<string>();
      const foundational = ready.filter((id) => {
        const task = graph.tasks.get(id);
        if (!task) return false;
        const match = heuristics.classifyFoundational(task);
        match.reasons.forEach((reason) => reasons.add(reason));
        return match.foundational;
      });

      if (foundational.length === 0) {
        return { taskIds: ready, basis: { kind: 'dependencies' } };
      }
      return { taskIds: foundational, basis: { kind: 'foundational', reasons: Array.from(reasons) } };
    }),
};

const parallelMaximizing: OrderingStrategy = {
  name: 'parallel_maximizing',
  reorder: (readySets, { graph, conflicts }) => {
    const layers = readySets.map((set) => set.taskIds);
    const heights = computeHeights(graph, layers);
    const depths = computeDepths(graph, layers);

    return scheduleStepwise(readySets, graph, (ready) => {
      // Longest downstream chain first; sort is stable so ties keep ready order
      const candidates = [...ready].sort((a, b) => (heights.get(b) ?? 0) - (heights.get(a) ?? 0));
      const batch: string[] = [];
      for (const id of candidates) {
        if (!conflicts || batch.every((member) => !conflicts.conflicts(id, member))) {
          batch.push(id);
        }
      }

      const sourceLayers = Array.from(new Set(batch.map((id) => (depths.get(id) ?? 0) + 1))).sort(
        (a, b) => a - b
      );
      return {
        taskIds: batch,
        basis:
          sourceLayers.length > 1 ? { kind: 'merged', layers: sourceLayers } : { kind: 'dependencies' },
      };
    });
  },
};

const STRATEGIES: Record<OrderingStrategyName, OrderingStrategy> = {
  topological,
  risk_first: riskFirst,
  foundational_first: foundationalFirst,
  parallel_maximizing: parallelMaximizing,
};

export function getStrategy(name: OrderingStrategyName): OrderingStrategy {
  return STRATEGIES[name];
}

/**
 * Check that every task appears exactly once and strictly after all of its
 * dependencies. Shared by every strategy.
 * @throws StrategyInvariantError
 */
export function enforceDependencyOrder(
  readySets: readonly ReadySet[],
  graph: DependencyGraph,
  strategy: OrderingStrategyName
): void {
  const placed = new Set<string>();

  for (const set of readySets) {
    const inSet = new Set<string>();
    for (const id of set.taskIds) {
      if (placed.has(id) || inSet.has(id)) {
        throw new StrategyInvariantError(strategy, id, 'task scheduled more than once');
      }
      if (!graph.tasks.has(id)) {
        throw new StrategyInvariantError(strategy, id, 'task is not part of the graph');
      }
      for (const dep of getDependencies(graph, id)) {
        if (!placed.has(dep)) {
          throw new StrategyInvariantError(strategy, id, `scheduled before its dependency ${dep}`);
        }
      }
      inSet.add(id);
    }
    inSet.forEach((id) => placed.add(id));
  }

  const missing = graph.nodes.find((id) => !placed.has(id));
  if (missing !== undefined) {
    throw new StrategyInvariantError(strategy, missing, 'task was never scheduled');
  }
}

export function orderReadySets(
  readySets: readonly ReadySet[],
  strategyName: OrderingStrategyName,
  context: StrategyContext
): ReadySet[] {
  const ordered = getStrategy(strategyName).reorder(readySets, context);
  enforceDependencyOrder(ordered, context.graph, strategyName);
  return ordered;
}
