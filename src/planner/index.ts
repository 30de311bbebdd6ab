import { createConflictDetector } from '../conflicts/resources.js';
import { applyConflictResolution, withoutConflictResolution } from '../conflicts/splitter.js';
import { type PlannerOptionsInput, resolvePlannerOptions } from '../config/strategy.js';
import { type DebugTracer, createNoopTracer } from '../debug/index.js';
import { buildDependencyGraph, getDroppedDependencies } from '../graph/builder.js';
import { CycleDetectedError, topologicalLayers } from '../graph/topo-sort.js';
import { type TaskHeuristics, defaultHeuristics } from '../ordering/heuristics.js';
import { orderReadySets, toReadySets } from '../ordering/strategies.js';
import { formatMalformedTask, ingestTasks } from '../tasks/intake.js';
import type { ExecutionPlan, MalformedTask } from '../types/index.js';
import { assemblePlan } from './assemble.js';

export interface PlanResult {
  plan: ExecutionPlan;
  warnings: MalformedTask[]; // Records skipped during intake
}

export interface PlanRuntime {
  heuristics?: TaskHeuristics;
  tracer?: DebugTracer;
}

/**
 * Compute an execution plan from a snapshot of tracker records.
 *
 * Pure apart from tracer calls: the same records and options always give the
 * same plan.
 *
 * @throws ConfigurationError for unknown strategies or invalid options
 * @throws CycleDetectedError when the open tasks contain a dependency cycle
 */
export function planExecution(
  records: readonly unknown[],
  options: PlannerOptionsInput = {},
  runtime: PlanRuntime = {}
): PlanResult {
  const { strategy, detectConflicts } = resolvePlannerOptions(options);
  const heuristics = runtime.heuristics ?? defaultHeuristics;
  const tracer = runtime.tracer ?? createNoopTracer();

  const intake = ingestTasks(records);
  for (const warning of intake.skipped) {
    tracer.logDecision('intake', { ...warning }, 'skipped', formatMalformedTask(warning));
  }
  tracer.logStageComplete(
    'intake',
    `${intake.tasks.length} open task(s), ${intake.closedCount} closed, ${intake.skipped.length} skipped`
  );

  const graph = buildDependencyGraph(intake.tasks);
  for (const id of graph.nodes) {
    const dropped = getDroppedDependencies(graph, id);
    if (dropped.length > 0) {
      tracer.logDecision(
        'dangling_dependency',
        { taskId: id, dependencies: dropped },
        'dropped',
        'Dependency is closed or not in the snapshot'
      );
    }
  }
  tracer.logStageComplete('graph', `${graph.nodes.length} node(s)`);

  let layers: string[][];
  try {
    layers = topologicalLayers(graph);
  } catch (e) {
    if (e instanceof CycleDetectedError) {
      tracer.logError(e.message, 'sort', { taskIds: e.taskIds, cycles: e.cycles });
    }
    throw e;
  }
  tracer.logStageComplete('sort', `${layers.length} ready set(s)`, { layers });

  const conflicts = detectConflicts ? createConflictDetector(graph) : null;
  const readySets = orderReadySets(toReadySets(layers), strategy, { graph, heuristics, conflicts });
  tracer.logStageComplete('strategy', `${strategy}: ${readySets.length} ready set(s)`, {
    readySets: readySets.map((set) => set.taskIds),
  });

  const groups = conflicts
    ? applyConflictResolution(readySets, conflicts)
    : withoutConflictResolution(readySets);
  for (const group of groups) {
    if (group.split) {
      tracer.logDecision(
        'conflict_split',
        { taskIds: group.taskIds, resources: group.split.resources },
        `part ${group.split.part}/${group.split.parts}`,
        'Tasks reference the same resource and cannot run together'
      );
    }
  }
  tracer.logStageComplete(
    'conflicts',
    detectConflicts ? `${groups.length} group(s) after conflict splitting` : 'skipped'
  );

  const plan = assemblePlan(strategy, groups, graph);
  tracer.logStageComplete(
    'assemble',
    `${plan.totalGroups} group(s), ${plan.parallelizableGroups} parallel, confidence ${plan.confidence}`
  );
  tracer.logPlanSnapshot({
    strategy: plan.strategy,
    totalTasks: plan.totalTasks,
    totalGroups: plan.totalGroups,
    parallelizableGroups: plan.parallelizableGroups,
    criticalPathLength: plan.criticalPathLength,
    sequence: plan.sequence,
  });

  return { plan, warnings: intake.skipped };
}
