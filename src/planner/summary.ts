import { getStrategyConfig } from '../config/strategy.js';
import { formatMalformedTask } from '../tasks/intake.js';
import { priorityLabel } from '../ordering/heuristics.js';
import type { ExecutionPlan, MalformedTask } from '../types/index.js';

const RULE = '='.repeat(60);

/**
 * Human-readable execution plan: headline numbers, then one block per group.
 */
export function formatExecutionPlan(plan: ExecutionPlan): string {
  const lines = [
    RULE,
    `Execution Plan: ${getStrategyConfig(plan.strategy).label} Strategy`,
    RULE,
    `Total tasks: ${plan.totalTasks}`,
    `Total groups: ${plan.totalGroups}`,
    `Parallelizable groups: ${plan.parallelizableGroups}`,
    `Critical path length: ${plan.criticalPathLength}`,
    `Confidence: ${plan.confidence.toFixed(2)}`,
    RULE,
    '',
  ];

  for (const group of plan.groups) {
    if (group.kind === 'parallel') {
      lines.push(`[P:Group-${group.index}] ${group.taskIds.length} parallel tasks:`);
    } else {
      lines.push(`[Group-${group.index}] Sequential task:`);
    }
    for (const id of group.taskIds) {
      const task = plan.tasks[id];
      const title = task ? `${task.title} (${priorityLabel(task.priority)})` : id;
      lines.push(`  - [${id}] ${title}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Prints the plan followed by any records that were skipped on the way in.
 */
export function printPlanSummary(plan: ExecutionPlan, warnings: readonly MalformedTask[] = []): void {
  console.log(formatExecutionPlan(plan));

  if (warnings.length > 0) {
    console.log(`Skipped records (${warnings.length}):`);
    for (const warning of warnings) {
      console.log(`  ${formatMalformedTask(warning)}`);
    }
    console.log('');
  }
}
