import type { MalformedTask, Task } from '../types/index.js';
import {
  CLOSED_STATUS,
  DependencyLinkSchema,
  LOWEST_PRIORITY,
  type ParsedTaskRecord,
  TaskRecordSchema,
} from './schema.js';

export interface IntakeResult {
  tasks: Task[]; // Valid, non-closed tasks in input order
  skipped: MalformedTask[];
  closedCount: number;
}

function normalizeDependencies(record: ParsedTaskRecord): string[] {
  const raw = [
    ...(record.depends_on ?? []),
    ...(record.dependsOn ?? []),
    ...(record.dependencies ?? []),
  ];
  const ids: string[] = [];

  for (const entry of raw) {
    let id: string | undefined;
    if (typeof entry === 'string') {
      id = entry.trim();
    } else {
      const link = DependencyLinkSchema.safeParse(entry);
      if (link.success && link.data.dependency_type !== 'parent-child') {
        id = link.data.id.trim();
      }
    }
    if (id && !ids.includes(id)) {
      ids.push(id);
    }
  }

  return ids;
}

export function toTask(record: ParsedTaskRecord): Task {
  return {
    id: record.id,
    title: record.title?.trim() || record.id,
    status: (record.status ?? 'open').trim().toLowerCase() || 'open',
    type: record.type ?? record.issue_type ?? 'task',
    priority: record.priority ?? LOWEST_PRIORITY,
    description: record.description ?? '',
    dependsOn: normalizeDependencies(record),
    labels: record.labels ?? [],
    parent: record.parent ?? null,
  };
}

function peekId(record: unknown): string | undefined {
  if (record && typeof record === 'object' && 'id' in record && typeof record.id === 'string') {
    return record.id.trim() || undefined;
  }
  return undefined;
}

/**
 * Validate raw tracker records. Malformed records are skipped and reported
 * rather than failing the whole run; closed tasks are dropped.
 */
export function ingestTasks(records: readonly unknown[]): IntakeResult {
  const tasks: Task[] = [];
  const skipped: MalformedTask[] = [];
  const seen = new Set<string>();
  let closedCount = 0;

  records.forEach((record, index) => {
    const parsed = TaskRecordSchema.safeParse(record);
    if (!parsed.success) {
      skipped.push({ index, id: peekId(record), reason: parsed.error.issues[0].message });
      return;
    }

    const task = toTask(parsed.data);
    if (seen.has(task.id)) {
      skipped.push({ index, id: task.id, reason: 'duplicate id' });
      return;
    }
    seen.add(task.id);

    if (task.status === CLOSED_STATUS) {
      closedCount++;
      return;
    }
    tasks.push(task);
  });

  return { tasks, skipped, closedCount };
}

export function formatMalformedTask(warning: MalformedTask): string {
  const subject = warning.id ? `record ${warning.index} (${warning.id})` : `record ${warning.index}`;
  return `Skipped ${subject}: ${warning.reason}`;
}
