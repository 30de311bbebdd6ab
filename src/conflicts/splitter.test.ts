import assert from 'node:assert';
import { describe, test } from 'node:test';
import { buildDependencyGraph } from '../graph/builder.js';
import { ingestTasks } from '../tasks/intake.js';
import type { ReadySet } from '../types/index.js';
import { createConflictDetector } from './resources.js';
import { applyConflictResolution, splitReadySet, withoutConflictResolution } from './splitter.js';

const graph = buildDependencyGraph(
  ingestTasks([
    { id: 'a', title: 'Edit src/x.ts' },
    { id: 'b', title: 'Fix src/x.ts' },
    { id: 'c', title: 'Edit src/y.ts' },
    { id: 'd', title: 'Rename src/x.ts' },
  ]).tasks
);
const detector = createConflictDetector(graph);
const ready = (...taskIds: string[]): ReadySet => ({ taskIds, basis: { kind: 'dependencies' } });

describe('splitReadySet', () => {
  test('leaves a conflict-free set whole', () => {
    const groups = splitReadySet(ready('a', 'c'), detector);
    assert.strictEqual(groups.length, 1);
    assert.deepStrictEqual(groups[0].taskIds, ['a', 'c']);
    assert.strictEqual(groups[0].split, undefined);
  });

  test('places each task in the first group it does not clash with', () => {
    const groups = splitReadySet(ready('a', 'b', 'c'), detector);

    assert.deepStrictEqual(
      groups.map((group) => group.taskIds),
      [['a', 'c'], ['b']]
    );
    assert.deepStrictEqual(groups[0].split, { part: 1, parts: 2, resources: ['src/x.ts'] });
    assert.deepStrictEqual(groups[1].split, { part: 2, parts: 2, resources: ['src/x.ts'] });
    assert.deepStrictEqual(groups[1].basis, { kind: 'dependencies' });
  });

  test('three tasks on one resource run one at a time', () => {
    const groups = splitReadySet(ready('a', 'b', 'd'), detector);
    assert.deepStrictEqual(
      groups.map((group) => group.taskIds),
      [['a'], ['b'], ['d']]
    );
  });

  test('single-task sets are untouched', () => {
    assert.deepStrictEqual(splitReadySet(ready('a'), detector), [
      { taskIds: ['a'], basis: { kind: 'dependencies' } },
    ]);
  });
});

describe('applyConflictResolution', () => {
  test('splits each ready set in order', () => {
    const groups = applyConflictResolution([ready('a', 'b'), ready('c')], detector);
    assert.deepStrictEqual(
      groups.map((group) => group.taskIds),
      [['a'], ['b'], ['c']]
    );
  });

  test('without resolution every set becomes one group', () => {
    const groups = withoutConflictResolution([ready('a', 'b'), ready('c')]);
    assert.deepStrictEqual(
      groups.map((group) => group.taskIds),
      [['a', 'b'], ['c']]
    );
  });
});
