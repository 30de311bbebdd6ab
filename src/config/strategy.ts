import { z } from 'zod';
import type { OrderingStrategyName } from '../types/index.js';

export const STRATEGY_NAMES = [
  'topological',
  'risk_first',
  'foundational_first',
  'parallel_maximizing',
] as const satisfies readonly OrderingStrategyName[];

export interface StrategyConfig {
  label: string; // Text output header
  description: string;
}

const STRATEGY_CONFIGS: Record<OrderingStrategyName, StrategyConfig> = {
  topological: {
    label: 'Topological',
    description: 'Dependency order only; every ready layer runs as one batch',
  },
  risk_first: {
    label: 'Risk First',
    description: 'Most urgent priority class first among tasks whose dependencies are met',
  },
  foundational_first: {
    label: 'Foundational First',
    description: 'Schema, setup and infrastructure work ahead of its ready peers',
  },
  parallel_maximizing: {
    label: 'Parallel Maximizing',
    description: 'Packs every independent ready task into the largest conflict-free batch',
  },
};

export function getStrategyConfig(strategy: OrderingStrategyName): StrategyConfig {
  return STRATEGY_CONFIGS[strategy];
}

/**
 * Error thrown when the caller asks for something the planner cannot be
 * configured to do. Raised before any graph work.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly option: string,
    public readonly value: unknown
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export const PlannerOptionsSchema = z.object({
  strategy: z.enum(STRATEGY_NAMES).default('topological'),
  detectConflicts: z.boolean().default(true),
});

export type PlannerOptions = z.infer<typeof PlannerOptionsSchema>;
export type PlannerOptionsInput = z.input<typeof PlannerOptionsSchema>;

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  Boolean(value && typeof value === 'object' && !Array.isArray(value));

/**
 * Validate caller options and fill in defaults.
 * @throws ConfigurationError naming the first offending option
 */
export function resolvePlannerOptions(input: unknown = {}): PlannerOptions {
  const result = PlannerOptionsSchema.safeParse(input ?? {});
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const option = issue.path.join('.') || 'options';
  const value = isPlainObject(input) ? input[option] : input;

  if (option === 'strategy') {
    throw new ConfigurationError(
      `Unknown strategy "${String(value)}". Expected one of: ${STRATEGY_NAMES.join(', ')}`,
      option,
      value
    );
  }
  throw new ConfigurationError(`Invalid planner option "${option}": ${issue.message}`, option, value);
}
