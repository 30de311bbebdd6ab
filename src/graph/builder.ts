import type { DependencyGraph, Task } from '../types/index.js';

/**
 * Build the dependency graph for a planning run.
 *
 * Every task becomes a node, with an edge to each dependency that is itself a
 * node. Dependencies on tasks outside the snapshot (closed or unknown) no
 * longer gate execution and are dropped.
 */
export function buildDependencyGraph(tasks: readonly Task[]): DependencyGraph {
  const nodes: string[] = [];
  const adjacency = new Map<string, Set<string>>();
  const reverseAdjacency = new Map<string, Set<string>>();
  const taskMap = new Map<string, Task>();

  for (const task of tasks) {
    if (taskMap.has(task.id)) continue;
    nodes.push(task.id);
    taskMap.set(task.id, task);
    adjacency.set(task.id, new Set());
    reverseAdjacency.set(task.id, new Set());
  }

  for (const id of nodes) {
    const dependencies = adjacency.get(id);
    const task = taskMap.get(id);
    if (!dependencies || !task) continue;

    for (const dep of task.dependsOn) {
      const dependents = reverseAdjacency.get(dep);
      if (!dependents) continue; // dangling
      dependencies.add(dep);
      dependents.add(id);
    }
  }

  return { nodes, adjacency, reverseAdjacency, tasks: taskMap };
}

export function getDependencies(graph: DependencyGraph, id: string): ReadonlySet<string> {
  return graph.adjacency.get(id) ?? new Set();
}

export function getDependents(graph: DependencyGraph, id: string): ReadonlySet<string> {
  return graph.reverseAdjacency.get(id) ?? new Set();
}

/** Dependency ids a task declared that are not part of the graph. */
export function getDroppedDependencies(graph: DependencyGraph, id: string): string[] {
  const task = graph.tasks.get(id);
  if (!task) return [];
  return task.dependsOn.filter((dep) => !graph.tasks.has(dep));
}
