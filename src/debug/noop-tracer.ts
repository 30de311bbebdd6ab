import type { DebugTracer, PlanSnapshotEvent, PlanningStage } from './types.js';

class NoopTracer implements DebugTracer {
  async init(_runId: string, _source: string, _strategy: string): Promise<void> {}
  async finalize(): Promise<void> {}
  logStageComplete(_stage: PlanningStage, _summary: string, _data?: Record<string, unknown>): void {}
  logDecision(
    _category: string,
    _input: Record<string, unknown>,
    _outcome: string,
    _reason: string
  ): void {}
  logPlanSnapshot(_plan: PlanSnapshotEvent['plan']): void {}
  logError(_error: string, _stage: PlanningStage, _context?: Record<string, unknown>): void {}
}

export function createNoopTracer(): DebugTracer {
  return new NoopTracer();
}
