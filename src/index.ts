#!/usr/bin/env node
import { randomUUID } from 'node:crypto';
import { resolve } from 'node:path';
import { text } from 'node:stream/consumers';
import { CommanderError } from 'commander';
import { type CliOptions, getExitCode, parseArgs, renderPlan } from './cli.js';
import { createTracer, runTraced } from './debug/index.js';
import { planExecution } from './planner/index.js';
import { printPlanSummary } from './planner/summary.js';
import { formatMalformedTask } from './tasks/intake.js';
import { loadTaskFile, parseTaskList } from './tasks/loader.js';

async function readRecords(file: string | null): Promise<unknown[]> {
  if (file) {
    return loadTaskFile(resolve(file));
  }
  return parseTaskList(await text(process.stdin), '<stdin>');
}

async function run(opts: CliOptions): Promise<void> {
  const records = await readRecords(opts.file);
  const source = opts.file ? resolve(opts.file) : '<stdin>';

  const stateDir = resolve(opts.stateDir);
  const tracer = createTracer(opts.debug, stateDir);
  const runId = randomUUID();
  if (opts.debug) {
    await tracer.init(runId, source, opts.strategy);
    console.error(`Debug tracing enabled: ${stateDir}/debug/${runId}/`);
  }

  await runTraced(tracer, () => {
    const { plan, warnings } = planExecution(
      records,
      { strategy: opts.strategy, detectConflicts: opts.detectConflicts },
      { tracer }
    );

    if (opts.format === 'text') {
      printPlanSummary(plan, warnings);
    } else {
      for (const warning of warnings) {
        console.error(`Warning: ${formatMalformedTask(warning)}`);
      }
      console.log(renderPlan(plan, opts.format));
    }
  });
}

async function main() {
  let opts: CliOptions;
  try {
    opts = parseArgs(process.argv.slice(2));
  } catch (err) {
    // Commander has already printed help, version or usage output
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }
    throw err;
  }

  await run(opts);
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(getExitCode(err));
});
