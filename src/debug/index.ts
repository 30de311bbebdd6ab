export type { DebugTracer, DebugEvent, PlanningStage, TraceFile } from './types.js';
export { createNoopTracer } from './noop-tracer.js';
export { createFileTracer } from './file-tracer.js';

import { createFileTracer } from './file-tracer.js';
import { createNoopTracer } from './noop-tracer.js';
import type { DebugTracer } from './types.js';

export function createTracer(debug: boolean, stateDir: string): DebugTracer {
  return debug ? createFileTracer(stateDir) : createNoopTracer();
}

/**
 * Run `work`, then flush the trace. When the work fails, a flush failure is
 * only reported so the caller still sees the original error.
 */
export async function runTraced<T>(tracer: DebugTracer, work: () => Promise<T> | T): Promise<T> {
  let result: T;
  try {
    result = await work();
  } catch (err) {
    try {
      await tracer.finalize();
    } catch (finalizeErr) {
      const message = finalizeErr instanceof Error ? finalizeErr.message : String(finalizeErr);
      console.error(`Warning: could not finalize debug trace: ${message}`);
    }
    throw err;
  }

  await tracer.finalize();
  return result;
}
