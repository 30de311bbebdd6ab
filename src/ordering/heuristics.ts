import { LOWEST_PRIORITY } from '../tasks/schema.js';
import type { Task } from '../types/index.js';

export interface FoundationalMatch {
  foundational: boolean;
  reasons: string[]; // e.g. "title:schema", "type:chore"
}

/**
 * Scoring hooks used by the ordering strategies. Swap in another
 * implementation to change what counts as urgent or foundational without
 * touching the sorter.
 */
export interface TaskHeuristics {
  priorityClass(task: Task): number;
  classifyFoundational(task: Task): FoundationalMatch;
}

export const FOUNDATION_KEYWORDS = new Set([
  'schema',
  'migration',
  'core',
  'base',
  'init',
  'initialize',
  'bootstrap',
  'scaffold',
  'setup',
  'install',
  'config',
  'configure',
  'infrastructure',
  'infra',
]);

const FOUNDATION_TYPES = new Set(['chore']);

export const PRIORITY_LABELS: Record<number, string> = {
  0: 'P0', // Critical
  1: 'P1', // High
  2: 'P2', // Normal
  3: 'P3', // Low
  4: 'P4', // Lowest
};

export function priorityLabel(priority: number): string {
  return PRIORITY_LABELS[priority] ?? `P${priority}`;
}

export const tokenize = (value?: string): string[] => {
  if (!value) return [];
  return value
    .toLowerCase()
    .split(/[^a-z0-9]+/g)
    .filter(Boolean);
};

const collectHits = (tokens: string[], keywords: Set<string>): string[] =>
  Array.from(new Set(tokens.filter((token) => keywords.has(token))));

export function createKeywordHeuristics(keywords: Iterable<string> = FOUNDATION_KEYWORDS): TaskHeuristics {
  const foundationKeywords = new Set(Array.from(keywords, (keyword) => keyword.toLowerCase()));

  return {
    priorityClass: (task) =>
      Number.isInteger(task.priority) && task.priority >= 0 ? task.priority : LOWEST_PRIORITY,

    classifyFoundational: (task) => {
      const titleHits = collectHits(tokenize(task.title), foundationKeywords);
      const descriptionHits = collectHits(tokenize(task.description), foundationKeywords).filter(
        (hit) => !titleHits.includes(hit)
      );
      const type = task.type.toLowerCase();
      const typeHit = FOUNDATION_TYPES.has(type);

      const reasons = [
        ...titleHits.map((hit) => `title:${hit}`),
        ...descriptionHits.map((hit) => `description:${hit}`),
        ...(typeHit ? [`type:${type}`] : []),
      ];
      return { foundational: reasons.length > 0, reasons };
    },
  };
}

export const defaultHeuristics: TaskHeuristics = createKeywordHeuristics();
