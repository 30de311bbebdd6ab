import { z } from 'zod';
import { STRATEGY_NAMES } from '../config/strategy.js';
import type { ExecutionPlan, GroupKind, PlanDocument } from '../types/index.js';

const count = z.number().int().nonnegative();

export const PlanDocumentSchema = z
  .object({
    strategy: z.enum(STRATEGY_NAMES),
    totalTasks: count,
    totalGroups: count,
    parallelizableGroups: count,
    criticalPathLength: count,
    sequence: z.array(z.array(z.string()).min(1)),
    rationale: z.string(),
  })
  .refine((doc) => doc.totalGroups === doc.sequence.length, {
    message: 'totalGroups does not match the number of groups in sequence',
    path: ['totalGroups'],
  })
  .refine((doc) => doc.totalTasks === doc.sequence.reduce((sum, group) => sum + group.length, 0), {
    message: 'totalTasks does not match the number of tasks in sequence',
    path: ['totalTasks'],
  });

/**
 * Error thrown when a serialized plan does not match the plan document shape.
 */
export class PlanDocumentError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'PlanDocumentError';
  }
}

export function toPlanDocument(plan: ExecutionPlan): PlanDocument {
  return {
    strategy: plan.strategy,
    totalTasks: plan.totalTasks,
    totalGroups: plan.totalGroups,
    parallelizableGroups: plan.parallelizableGroups,
    criticalPathLength: plan.criticalPathLength,
    sequence: plan.sequence.map((group) => [...group]),
    rationale: plan.rationale,
  };
}

export function serializePlanDocument(plan: ExecutionPlan): string {
  return JSON.stringify(toPlanDocument(plan), null, 2);
}

/**
 * Parse and validate a plan document produced by `serializePlanDocument`.
 * @throws PlanDocumentError
 */
export function parsePlanDocument(json: string): PlanDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (e) {
    throw new PlanDocumentError(`Plan document is not valid JSON: ${String(e)}`, []);
  }

  const result = PlanDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new PlanDocumentError(`Invalid plan document: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export interface SimplifiedTask {
  id: string;
  title: string;
  priority: number;
  type: string;
}

export interface SimplifiedGroup {
  groupId: number;
  type: GroupKind;
  taskCount: number;
  tasks: SimplifiedTask[];
}

export interface SimplifiedPlan {
  strategy: string;
  totalTasks: number;
  totalGroups: number;
  parallelizableGroups: number;
  criticalPathLength: number;
  groups: SimplifiedGroup[];
}

/** Compact per-group view with task details, for executors and dashboards. */
export function simplifyPlan(plan: ExecutionPlan): SimplifiedPlan {
  return {
    strategy: plan.strategy,
    totalTasks: plan.totalTasks,
    totalGroups: plan.totalGroups,
    parallelizableGroups: plan.parallelizableGroups,
    criticalPathLength: plan.criticalPathLength,
    groups: plan.groups.map((group) => ({
      groupId: group.index,
      type: group.kind,
      taskCount: group.taskIds.length,
      tasks: group.taskIds.map((id) => {
        const task = plan.tasks[id];
        return {
          id,
          title: task?.title ?? id,
          priority: task?.priority ?? 0,
          type: task?.type ?? 'task',
        };
      }),
    })),
  };
}

/**
 * The first group that still has unfinished work, or an empty list once
 * every task has completed. Groups run in order, so nothing later is
 * considered until this one is done.
 */
export function getNextGroup(
  plan: Pick<PlanDocument, 'sequence'>,
  completed: Iterable<string>
): string[] {
  const done = new Set(completed);
  for (const group of plan.sequence) {
    const remaining = group.filter((id) => !done.has(id));
    if (remaining.length > 0) {
      return remaining;
    }
  }
  return [];
}
