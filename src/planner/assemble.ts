import type { SplitGroup } from '../conflicts/splitter.js';
import { getStrategyConfig } from '../config/strategy.js';
import { priorityLabel } from '../ordering/heuristics.js';
import type {
  DependencyGraph,
  ExecutionGroup,
  ExecutionPlan,
  OrderingStrategyName,
  PlacementBasis,
  Task,
} from '../types/index.js';

const BASE_CONFIDENCE = 0.8;
const PARALLEL_GROUP_BONUS = 0.1;
const MAX_PARALLEL_BONUS = 0.2;
const SEQUENTIAL_RATIO_THRESHOLD = 0.7;
const SEQUENTIAL_PENALTY = 0.1;

export function toExecutionGroups(groups: readonly SplitGroup[]): ExecutionGroup[] {
  return groups.map((group, i): ExecutionGroup => ({
    index: i + 1,
    kind: group.taskIds.length > 1 ? 'parallel' : 'sequential',
    taskIds: [...group.taskIds],
    basis: group.basis,
    ...(group.split ? { split: group.split } : {}),
  }));
}

/**
 * How much to trust the plan as a parallel schedule: rewarded for parallel
 * groups, penalised when most tasks still run one at a time.
 */
export function computeConfidence(groups: readonly ExecutionGroup[]): number {
  const totalTasks = groups.reduce((sum, group) => sum + group.taskIds.length, 0);
  if (totalTasks === 0) return 0;

  let confidence = BASE_CONFIDENCE;
  const parallelGroups = groups.filter((group) => group.kind === 'parallel').length;
  if (parallelGroups > 0) {
    confidence += Math.min(PARALLEL_GROUP_BONUS * parallelGroups, MAX_PARALLEL_BONUS);
  }

  const sequentialTasks = groups.filter((group) => group.kind === 'sequential').length;
  if (sequentialTasks / totalTasks > SEQUENTIAL_RATIO_THRESHOLD) {
    confidence -= SEQUENTIAL_PENALTY;
  }

  return Math.round(Math.max(0, Math.min(1, confidence)) * 100) / 100;
}

export function describeBasis(basis: PlacementBasis): string {
  switch (basis.kind) {
    case 'dependencies':
      return 'dependencies satisfied';
    case 'priority':
      return `priority class ${priorityLabel(basis.priority)}`;
    case 'foundational':
      return `foundational work first (${basis.reasons.join(', ')})`;
    case 'merged':
      return `merged layers ${basis.layers.join(', ')}`;
  }
}

function describeGroup(group: ExecutionGroup): string {
  const parts = [describeBasis(group.basis)];
  if (group.split) {
    parts.push(
      `conflict split ${group.split.part}/${group.split.parts} on ${group.split.resources.join(', ')}`
    );
  }
  return parts.join('; ');
}

function describeTask(id: string, tasks: ReadonlyMap<string, Task>): string {
  const task = tasks.get(id);
  return task ? `${task.title} (${priorityLabel(task.priority)})` : id;
}

export function buildRationale(
  strategy: OrderingStrategyName,
  groups: readonly ExecutionGroup[],
  tasks: ReadonlyMap<string, Task>
): string {
  const config = getStrategyConfig(strategy);
  const lines = [`Strategy: ${strategy} (${config.description})`, ''];

  if (groups.length === 0) {
    lines.push('No open tasks to schedule.');
  }

  for (const group of groups) {
    if (group.kind === 'sequential') {
      const id = group.taskIds[0];
      lines.push(
        `Group ${group.index}: [${id}] ${describeTask(id, tasks)} - sequential; ${describeGroup(group)}`
      );
    } else {
      lines.push(
        `Group ${group.index}: [P:Group-${group.index}] ${group.taskIds.length} parallel tasks; ${describeGroup(group)}`
      );
      for (const id of group.taskIds) {
        lines.push(`  - ${id}: ${describeTask(id, tasks)}`);
      }
    }
  }

  return lines.join('\n');
}

export function assemblePlan(
  strategy: OrderingStrategyName,
  splitGroups: readonly SplitGroup[],
  graph: DependencyGraph
): ExecutionPlan {
  const groups = toExecutionGroups(splitGroups);
  // Defined as own properties, so ids such as __proto__ survive
  const tasks: Record<string, Task> = Object.fromEntries(graph.tasks);

  return {
    strategy,
    groups,
    sequence: groups.map((group) => [...group.taskIds]),
    totalTasks: groups.reduce((sum, group) => sum + group.taskIds.length, 0),
    totalGroups: groups.length,
    parallelizableGroups: groups.filter((group) => group.kind === 'parallel').length,
    // Every group is a synchronization point, so the plan length is the critical path
    criticalPathLength: groups.length,
    confidence: computeConfidence(groups),
    rationale: buildRationale(strategy, groups, graph.tasks),
    tasks,
  };
}
