import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { TaskFileSchema } from './schema.js';

/**
 * Error thrown when a task list cannot be read or does not have a
 * recognisable shape.
 */
export class TaskFileError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TaskFileError';
  }
}

/**
 * Parse a tracker export. Accepts JSON or YAML holding either a bare array of
 * records or an object with a `tasks` or `issues` array.
 */
export function parseTaskList(content: string, source = '<input>'): unknown[] {
  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (e) {
    throw new TaskFileError(`Could not parse task list from ${source}: ${String(e)}`, source, {
      cause: e,
    });
  }

  const result = TaskFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new TaskFileError(
      `Task list in ${source} must be an array or an object with a "tasks" or "issues" array`,
      source
    );
  }

  const data = result.data;
  if (Array.isArray(data)) return data;
  return 'tasks' in data ? data.tasks : data.issues;
}

export async function loadTaskFile(filePath: string): Promise<unknown[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (e) {
    throw new TaskFileError(`Task file not found or unreadable: ${filePath}`, filePath, {
      cause: e,
    });
  }
  return parseTaskList(content, filePath);
}
