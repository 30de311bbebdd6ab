// src/debug/types.ts
import type { OrderingStrategyName } from '../types/index.js';

export type PlanningStage = 'intake' | 'graph' | 'sort' | 'strategy' | 'conflicts' | 'assemble';

export interface TraceEvent {
  type: string;
  timestamp: string;
}

export interface StageCompleteEvent extends TraceEvent {
  type: 'stage_complete';
  stage: PlanningStage;
  summary: string;
  data: Record<string, unknown>;
}

export interface DecisionEvent extends TraceEvent {
  type: 'decision';
  category: string;
  input: Record<string, unknown>;
  outcome: string;
  reason: string;
}

export interface PlanSnapshotEvent extends TraceEvent {
  type: 'plan_snapshot';
  plan: {
    strategy: OrderingStrategyName;
    totalTasks: number;
    totalGroups: number;
    parallelizableGroups: number;
    criticalPathLength: number;
    sequence: string[][];
  };
}

export interface ErrorEvent extends TraceEvent {
  type: 'error';
  error: string;
  stage: PlanningStage;
  context?: Record<string, unknown>;
}

export type DebugEvent = StageCompleteEvent | DecisionEvent | PlanSnapshotEvent | ErrorEvent;

export interface TraceFile {
  runId: string;
  source: string;
  strategy: string;
  startedAt: string;
  completedAt: string | null;
  events: DebugEvent[];
}

export interface DebugTracer {
  init(runId: string, source: string, strategy: string): Promise<void>;
  /** Flush the trace; rejects if any earlier write failed */
  finalize(): Promise<void>;
  logStageComplete(stage: PlanningStage, summary: string, data?: Record<string, unknown>): void;
  logDecision(
    category: string,
    input: Record<string, unknown>,
    outcome: string,
    reason: string
  ): void;
  logPlanSnapshot(plan: PlanSnapshotEvent['plan']): void;
  logError(error: string, stage: PlanningStage, context?: Record<string, unknown>): void;
}
