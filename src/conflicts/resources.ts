import type { DependencyGraph, Task } from '../types/index.js';

export type ResourceAccess = 'read' | 'write';

export interface ResourceReference {
  resource: string;
  access: ResourceAccess;
}

const FILE_EXTENSION =
  /\.(ts|tsx|js|jsx|mjs|cjs|json|ya?ml|toml|ini|env|md|mdx|txt|py|go|rs|java|kt|rb|php|cs|c|h|cpp|hpp|swift|sql|prisma|graphql|proto|css|scss|html|vue|svelte|sh|lock)$/i;
const PATH_SEGMENT = /^[\w@.-]+$/;
const BACKTICKED = /`([^`]+)`/;

const READ_VERBS = new Set(['read', 'reads', 'reading', 'consult']);
// Any of these anywhere in the text makes every reference a write
const WRITE_VERBS = new Set([
  'add',
  'adds',
  'append',
  'bump',
  'change',
  'create',
  'delete',
  'drop',
  'edit',
  'extend',
  'fix',
  'fixes',
  'generate',
  'implement',
  'insert',
  'migrate',
  'modify',
  'move',
  'patch',
  'refactor',
  'remove',
  'rename',
  'replace',
  'rewrite',
  'touch',
  'update',
  'updates',
  'wire',
  'write',
  'writes',
]);
const LINKING_WORDS = new Set(['from', 'in', 'the']);

const LEADING_PUNCTUATION = /^[("'<[{]+/;
const TRAILING_PUNCTUATION = /[)"'>\]},;:!?.]+$/;

function stripPunctuation(token: string): string {
  return token.replace(LEADING_PUNCTUATION, '').replace(TRAILING_PUNCTUATION, '');
}

function normalizeResource(token: string): string {
  return token.replace(/^\.\//, '').replace(/\/+$/, '').toLowerCase();
}

export function isPathLike(token: string): boolean {
  if (token.includes('://')) return true;
  if (token.includes('/')) {
    const segments = token.split('/').filter(Boolean);
    return segments.length > 0 && segments.every((segment) => PATH_SEGMENT.test(segment));
  }
  return PATH_SEGMENT.test(token) && FILE_EXTENSION.test(token);
}

function precedingVerb(words: string[], index: number): string | undefined {
  let cursor = index - 1;
  while (cursor >= 0 && LINKING_WORDS.has(words[cursor])) {
    cursor--;
  }
  return cursor >= 0 ? words[cursor] : undefined;
}

/**
 * Pull concrete resource identifiers (file paths, backtick-quoted names) out
 * of free text. A reference is read-only only when a read verb directly
 * precedes it and no write verb appears anywhere in the text; anything else
 * is treated as a write.
 */
export function extractResourceReferences(text: string): ResourceReference[] {
  const rawTokens = text.split(/\s+/).filter(Boolean);
  const words = rawTokens.map((token) => stripPunctuation(token).toLowerCase());
  const writes = words.some((word) => WRITE_VERBS.has(word));
  const references = new Map<string, ResourceAccess>();

  rawTokens.forEach((raw, index) => {
    const quoted = raw.match(BACKTICKED);
    const candidate = quoted ? quoted[1].trim() : stripPunctuation(raw);
    if (!candidate || (!quoted && !isPathLike(candidate))) return;

    const resource = normalizeResource(candidate);
    if (!resource) return;

    const verb = precedingVerb(words, index);
    const access: ResourceAccess = !writes && verb && READ_VERBS.has(verb) ? 'read' : 'write';
    if (references.get(resource) !== 'write') {
      references.set(resource, access);
    }
  });

  return Array.from(references, ([resource, access]) => ({ resource, access }));
}

export function getTaskResources(task: Task): ResourceReference[] {
  return extractResourceReferences(`${task.title}\n${task.description}`);
}

export interface ConflictDetector {
  /** Resources that make the two tasks unsafe to run together (empty when safe). */
  sharedResources(a: string, b: string): string[];
  conflicts(a: string, b: string): boolean;
}

export function createConflictDetector(graph: DependencyGraph): ConflictDetector {
  const cache = new Map<string, Map<string, ResourceAccess>>();

  const resourcesOf = (id: string): Map<string, ResourceAccess> => {
    let refs = cache.get(id);
    if (!refs) {
      const task = graph.tasks.get(id);
      refs = new Map(task ? getTaskResources(task).map((ref) => [ref.resource, ref.access]) : []);
      cache.set(id, refs);
    }
    return refs;
  };

  const sharedResources = (a: string, b: string): string[] => {
    if (a === b) return [];
    const left = resourcesOf(a);
    const right = resourcesOf(b);
    const shared: string[] = [];
    for (const [resource, access] of left) {
      const other = right.get(resource);
      if (other && (access === 'write' || other === 'write')) {
        shared.push(resource);
      }
    }
    return shared.sort();
  };

  return {
    sharedResources,
    conflicts: (a, b) => sharedResources(a, b).length > 0,
  };
}
