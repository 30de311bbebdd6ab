// Library entry point for executors that embed the planner
export { ConfigurationError, STRATEGY_NAMES, getStrategyConfig, resolvePlannerOptions } from './config/strategy.js';
export type { PlannerOptions, PlannerOptionsInput, StrategyConfig } from './config/strategy.js';
export { createConflictDetector, extractResourceReferences } from './conflicts/resources.js';
export type { ConflictDetector, ResourceAccess, ResourceReference } from './conflicts/resources.js';
export { createTracer, runTraced } from './debug/index.js';
export type { DebugTracer } from './debug/index.js';
export { CycleDetectedError } from './graph/topo-sort.js';
export { createKeywordHeuristics, defaultHeuristics } from './ordering/heuristics.js';
export type { FoundationalMatch, TaskHeuristics } from './ordering/heuristics.js';
export { StrategyInvariantError } from './ordering/strategies.js';
export {
  PlanDocumentError,
  getNextGroup,
  parsePlanDocument,
  serializePlanDocument,
  simplifyPlan,
  toPlanDocument,
} from './planner/document.js';
export type { SimplifiedGroup, SimplifiedPlan, SimplifiedTask } from './planner/document.js';
export { planExecution } from './planner/index.js';
export type { PlanResult, PlanRuntime } from './planner/index.js';
export { formatExecutionPlan } from './planner/summary.js';
export { TaskFileError, loadTaskFile, parseTaskList } from './tasks/loader.js';
export type * from './types/index.js';
