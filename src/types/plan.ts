import type { Task } from './task.js';

export type OrderingStrategyName =
  | 'topological'
  | 'risk_first'
  | 'foundational_first'
  | 'parallel_maximizing';

export type GroupKind = 'sequential' | 'parallel';

/**
 * Why a ready set was formed the way it was. Carried through to the
 * execution groups and spelled out in the plan rationale.
 */
export type PlacementBasis =
  | { kind: 'dependencies' }
  | { kind: 'priority'; priority: number }
  | { kind: 'foundational'; reasons: string[] }
  | { kind: 'merged'; layers: number[] };

export interface ReadySet {
  taskIds: string[];
  basis: PlacementBasis;
}

export interface ConflictSplit {
  part: number; // 1-based
  parts: number;
  resources: string[];
}

export interface ExecutionGroup {
  index: number; // 1-based
  kind: GroupKind;
  taskIds: string[];
  basis: PlacementBasis;
  split?: ConflictSplit;
}

export interface ExecutionPlan {
  strategy: OrderingStrategyName;
  groups: ExecutionGroup[];
  sequence: string[][];
  totalTasks: number;
  totalGroups: number;
  parallelizableGroups: number;
  criticalPathLength: number;
  confidence: number;
  rationale: string;
  tasks: Record<string, Task>;
}

/** Plain outbound document consumed by the executor. */
export interface PlanDocument {
  strategy: OrderingStrategyName;
  totalTasks: number;
  totalGroups: number;
  parallelizableGroups: number;
  criticalPathLength: number;
  sequence: string[][];
  rationale: string;
}
