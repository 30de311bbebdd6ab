import { mkdirSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { DebugEvent, DebugTracer, PlanSnapshotEvent, PlanningStage, TraceFile } from './types.js';

class FileTracer implements DebugTracer {
  private stateDir: string;
  private debugDir = '';
  private trace: TraceFile | null = null;
  private writePromise: Promise<void> = Promise.resolve();
  private writeError: unknown = null;

  constructor(stateDir: string) {
    this.stateDir = stateDir;
  }

  get tracePath(): string {
    return join(this.debugDir, 'trace.json');
  }

  async init(runId: string, source: string, strategy: string): Promise<void> {
    this.debugDir = join(this.stateDir, 'debug', runId);
    mkdirSync(this.debugDir, { recursive: true });

    this.trace = {
      runId,
      source,
      strategy,
      startedAt: new Date().toISOString(),
      completedAt: null,
      events: [],
    };

    await this.saveTrace();
  }

  async finalize(): Promise<void> {
    if (this.trace) {
      this.trace.completedAt = new Date().toISOString();
      await this.saveTrace();
    }
    if (this.writeError) {
      throw new Error(`Failed to write debug trace to ${this.tracePath}`, { cause: this.writeError });
    }
  }

  logStageComplete(stage: PlanningStage, summary: string, data: Record<string, unknown> = {}): void {
    this.addEvent({
      type: 'stage_complete',
      timestamp: new Date().toISOString(),
      stage,
      summary,
      data,
    });
  }

  logDecision(
    category: string,
    input: Record<string, unknown>,
    outcome: string,
    reason: string
  ): void {
    this.addEvent({
      type: 'decision',
      timestamp: new Date().toISOString(),
      category,
      input,
      outcome,
      reason,
    });
  }

  logPlanSnapshot(plan: PlanSnapshotEvent['plan']): void {
    this.addEvent({
      type: 'plan_snapshot',
      timestamp: new Date().toISOString(),
      plan,
    });
  }

  logError(error: string, stage: PlanningStage, context?: Record<string, unknown>): void {
    this.addEvent({
      type: 'error',
      timestamp: new Date().toISOString(),
      error,
      stage,
      context,
    });
  }

  private addEvent(event: DebugEvent): void {
    if (this.trace) {
      this.trace.events.push(event);
      // Serialized writes keep trace.json intact; the first failure is reported by finalize()
      this.writePromise = this.writePromise
        .then(() => this.doSaveTrace())
        .catch((e: unknown) => {
          this.writeError ??= e;
        });
    }
  }

  private async saveTrace(): Promise<void> {
    await this.writePromise;
    await this.doSaveTrace();
  }

  private async doSaveTrace(): Promise<void> {
    if (this.trace) {
      await writeFile(this.tracePath, JSON.stringify(this.trace, null, 2));
    }
  }
}

export function createFileTracer(stateDir: string): DebugTracer {
  return new FileTracer(stateDir);
}
