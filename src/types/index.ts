export type { DependencyGraph } from './graph.js';
export type {
  ConflictSplit,
  ExecutionGroup,
  ExecutionPlan,
  GroupKind,
  OrderingStrategyName,
  PlacementBasis,
  PlanDocument,
  ReadySet,
} from './plan.js';
export type { MalformedTask, Task } from './task.js';
