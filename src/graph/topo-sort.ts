import type { DependencyGraph } from '../types/index.js';

/**
 * Error thrown when the dependency graph cannot be fully ordered.
 * `taskIds` lists every task left unscheduled; `cycles` lists the
 * dependency loops among them that have to be broken upstream.
 */
export class CycleDetectedError extends Error {
  constructor(
    public readonly taskIds: string[],
    public readonly cycles: string[][]
  ) {
    const described = cycles.map((cycle) => cycle.join(' ↔ ')).join('; ');
    super(
      `Dependency cycle detected: ${described || taskIds.join(', ')}. ${taskIds.length} task(s) cannot be scheduled: ${taskIds.join(', ')}`
    );
    this.name = 'CycleDetectedError';
  }
}

function indexNodes(graph: DependencyGraph): Map<string, number> {
  return new Map(graph.nodes.map((id, index) => [id, index]));
}

/**
 * Kahn layering. Each layer holds the tasks whose dependencies are all in
 * earlier layers; members keep input order.
 * @throws CycleDetectedError when some tasks can never become ready
 */
export function topologicalLayers(graph: DependencyGraph): string[][] {
  const position = indexNodes(graph);
  const byPosition = (a: string, b: string) => (position.get(a) ?? 0) - (position.get(b) ?? 0);

  const inDegree = new Map<string, number>();
  for (const id of graph.nodes) {
    inDegree.set(id, graph.adjacency.get(id)?.size ?? 0);
  }

  const layers: string[][] = [];
  let frontier = graph.nodes.filter((id) => inDegree.get(id) === 0);
  let emitted = 0;

  while (frontier.length > 0) {
    layers.push(frontier);
    emitted += frontier.length;

    const next: string[] = [];
    for (const id of frontier) {
      for (const dependent of graph.reverseAdjacency.get(id) ?? []) {
        const remaining = (inDegree.get(dependent) ?? 0) - 1;
        inDegree.set(dependent, remaining);
        if (remaining === 0) {
          next.push(dependent);
        }
      }
    }
    frontier = next.sort(byPosition);
  }

  if (emitted < graph.nodes.length) {
    const scheduled = new Set(layers.flat());
    const unresolved = graph.nodes.filter((id) => !scheduled.has(id));
    throw new CycleDetectedError(unresolved, findCycles(graph, unresolved));
  }

  return layers;
}

/**
 * Strongly connected components (Tarjan) among the given nodes that form an
 * actual loop: more than one member, or a task depending on itself.
 */
export function findCycles(graph: DependencyGraph, candidates: readonly string[]): string[][] {
  const position = indexNodes(graph);
  const byPosition = (a: string, b: string) => (position.get(a) ?? 0) - (position.get(b) ?? 0);
  const scope = new Set(candidates);

  let counter = 0;
  const index = new Map<string, number>();
  const lowLink = new Map<string, number>();
  const stack: string[] = [];
  const onStack = new Set<string>();
  const components: string[][] = [];

  // Explicit work stack: a long dependency chain must not exhaust the call stack
  const visit = (root: string): void => {
    const work: Array<{ id: string; deps: string[]; next: number }> = [];

    const open = (id: string): void => {
      index.set(id, counter);
      lowLink.set(id, counter);
      counter++;
      stack.push(id);
      onStack.add(id);
      work.push({ id, deps: Array.from(graph.adjacency.get(id) ?? []).filter((dep) => scope.has(dep)), next: 0 });
    };

    open(root);
    while (work.length > 0) {
      const frame = work[work.length - 1];

      if (frame.next < frame.deps.length) {
        const dep = frame.deps[frame.next++];
        if (!index.has(dep)) {
          open(dep);
        } else if (onStack.has(dep)) {
          lowLink.set(frame.id, Math.min(lowLink.get(frame.id) ?? 0, index.get(dep) ?? 0));
        }
        continue;
      }

      work.pop();
      const parent = work.at(-1);
      if (parent) {
        lowLink.set(parent.id, Math.min(lowLink.get(parent.id) ?? 0, lowLink.get(frame.id) ?? 0));
      }

      if (lowLink.get(frame.id) === index.get(frame.id)) {
        const component: string[] = [];
        let member: string | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          component.push(member);
        } while (member !== frame.id);

        const selfLoop = component.length === 1 && (graph.adjacency.get(frame.id)?.has(frame.id) ?? false);
        if (component.length > 1 || selfLoop) {
          components.push(component.sort(byPosition));
        }
      }
    }
  };

  for (const id of [...candidates].sort(byPosition)) {
    if (!index.has(id)) visit(id);
  }

  return components.sort((a, b) => byPosition(a[0], b[0]));
}

/** Longest dependency chain above each task (0 for tasks with no dependencies). */
export function computeDepths(graph: DependencyGraph, layers: readonly string[][]): Map<string, number> {
  const depths = new Map<string, number>();
  for (const layer of layers) {
    for (const id of layer) {
      let depth = 0;
      for (const dep of graph.adjacency.get(id) ?? []) {
        depth = Math.max(depth, (depths.get(dep) ?? 0) + 1);
      }
      depths.set(id, depth);
    }
  }
  return depths;
}

/** Longest chain of dependents below each task (0 for tasks nothing waits on). */
export function computeHeights(graph: DependencyGraph, layers: readonly string[][]): Map<string, number> {
  const heights = new Map<string, number>();
  for (let i = layers.length - 1; i >= 0; i--) {
    for (const id of layers[i]) {
      let height = 0;
      for (const dependent of graph.reverseAdjacency.get(id) ?? []) {
        height = Math.max(height, (heights.get(dependent) ?? 0) + 1);
      }
      heights.set(id, height);
    }
  }
  return heights;
}
