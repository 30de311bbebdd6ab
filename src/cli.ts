import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { z } from 'zod';
import { ConfigurationError, STRATEGY_NAMES, resolvePlannerOptions } from './config/strategy.js';
import { CycleDetectedError } from './graph/topo-sort.js';
import { serializePlanDocument, simplifyPlan, toPlanDocument } from './planner/document.js';
import type { ExecutionPlan, OrderingStrategyName } from './types/index.js';

export const OUTPUT_FORMATS = ['simple', 'detailed', 'json', 'text'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type JsonFormat = Exclude<OutputFormat, 'text'>;

export interface CliOptions {
  file: string | null; // null reads stdin
  strategy: OrderingStrategyName;
  detectConflicts: boolean;
  format: OutputFormat;
  stateDir: string;
  debug: boolean;
}

const RawOptionsSchema = z.object({
  strategy: z.string(),
  conflicts: z.boolean(),
  format: z.string(),
  stateDir: z.string(),
  debug: z.boolean(),
});

function getVersion(): string {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    const pkgPath = join(__dirname, '..', 'package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    const parsed = z.object({ version: z.string() }).safeParse(pkg);
    return parsed.success ? parsed.data.version : 'unknown';
  } catch {
    return 'unknown';
  }
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('waveplan')
    .version(getVersion(), '-v, --version', 'Show version number')
    .description('Plan dependency-ordered, conflict-free execution groups for tracker tasks')
    .argument('[file]', 'Task list as JSON or YAML (reads stdin when omitted or "-")')
    .option('--strategy <name>', `Ordering strategy: ${STRATEGY_NAMES.join('|')}`, 'topological')
    .option('--no-conflicts', 'Skip resource conflict detection')
    .option('--format <format>', `Output format: ${OUTPUT_FORMATS.join('|')}`, 'simple')
    .option('--state-dir <path>', 'State directory', '.waveplan')
    .option('--debug', 'Write a decision trace to <state-dir>/debug/<runId>/', false);

  return program;
}

/**
 * Parse command line arguments (without the node and script entries).
 * @throws CommanderError for --help, --version and usage errors
 * @throws ConfigurationError for an unknown strategy or output format
 */
export function parseArgs(argv: string[]): CliOptions {
  const program = createCLI().exitOverride();
  program.parse(argv, { from: 'user' });

  const opts = RawOptionsSchema.parse(program.opts());
  const { strategy, detectConflicts } = resolvePlannerOptions({
    strategy: opts.strategy,
    detectConflicts: opts.conflicts,
  });

  const format = z.enum(OUTPUT_FORMATS).safeParse(opts.format);
  if (!format.success) {
    throw new ConfigurationError(
      `Unknown output format "${opts.format}". Expected one of: ${OUTPUT_FORMATS.join(', ')}`,
      'format',
      opts.format
    );
  }

  const file = program.args[0];
  return {
    file: file && file !== '-' ? file : null,
    strategy,
    detectConflicts,
    format: format.data,
    stateDir: opts.stateDir,
    debug: opts.debug,
  };
}

/** 2 for dependency cycles; configuration, input and any other failure give 1. */
export function getExitCode(error: unknown): number {
  return error instanceof CycleDetectedError ? 2 : 1;
}

/**
 * JSON output for the machine-readable formats. `simple` is the per-group
 * view, `json` the plan document and `detailed` the document plus groups,
 * confidence and task details.
 */
export function renderPlan(plan: ExecutionPlan, format: JsonFormat): string {
  switch (format) {
    case 'simple':
      return JSON.stringify(simplifyPlan(plan), null, 2);
    case 'json':
      return serializePlanDocument(plan);
    case 'detailed':
      return JSON.stringify(
        {
          ...toPlanDocument(plan),
          confidence: plan.confidence,
          groups: plan.groups,
          tasks: plan.tasks,
        },
        null,
        2
      );
  }
}
