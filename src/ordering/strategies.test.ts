import assert from 'node:assert';
import { describe, test } from 'node:test';
import { createConflictDetector } from '../conflicts/resources.js';
import { buildDependencyGraph } from '../graph/builder.js';
import { topologicalLayers } from '../graph/topo-sort.js';
import { ingestTasks } from '../tasks/intake.js';
import type { OrderingStrategyName, ReadySet } from '../types/index.js';
import { defaultHeuristics } from './heuristics.js';
import {
  StrategyInvariantError,
  enforceDependencyOrder,
  orderReadySets,
  toReadySets,
} from './strategies.js';

function order(records: unknown[], strategy: OrderingStrategyName, detectConflicts = false) {
  const graph = buildDependencyGraph(ingestTasks(records).tasks);
  const readySets = toReadySets(topologicalLayers(graph));
  const conflicts = detectConflicts ? createConflictDetector(graph) : null;
  return orderReadySets(readySets, strategy, { graph, heuristics: defaultHeuristics, conflicts });
}

const ids = (sets: ReadySet[]) => sets.map((set) => set.taskIds);

describe('topological strategy', () => {
  test('returns the ready sets unchanged', () => {
    const result = order([{ id: 'a' }, { id: 'b' }, { id: 'c', depends_on: ['a'] }], 'topological');
    assert.deepStrictEqual(ids(result), [['a', 'b'], ['c']]);
    assert.deepStrictEqual(result[0].basis, { kind: 'dependencies' });
  });
});

describe('risk_first strategy', () => {
  test('runs the most urgent ready class first', () => {
    const result = order(
      [
        { id: 'a', priority: 2 },
        { id: 'b', priority: 0, depends_on: ['a'] },
        { id: 'c', priority: 1 },
      ],
      'risk_first'
    );

    assert.deepStrictEqual(ids(result), [['c'], ['a'], ['b']]);
    assert.deepStrictEqual(
      result.map((set) => set.basis),
      [
        { kind: 'priority', priority: 1 },
        { kind: 'priority', priority: 2 },
        { kind: 'priority', priority: 0 },
      ]
    );
  });

  test('tasks of the same class stay together', () => {
    const result = order(
      [
        { id: 'a', priority: 1 },
        { id: 'b', priority: 3 },
        { id: 'c', priority: 1 },
      ],
      'risk_first'
    );
    assert.deepStrictEqual(ids(result), [['a', 'c'], ['b']]);
  });

  test('a very wide ready set stays one group', () => {
    const size = 200_000;
    const result = order(
      Array.from({ length: size }, (_, i) => ({ id: `t${i}`, priority: 2 })),
      'risk_first'
    );

    assert.strictEqual(result.length, 1);
    assert.strictEqual(result[0].taskIds.length, size);
    assert.deepStrictEqual(result[0].basis, { kind: 'priority', priority: 2 });
  });

  test('a long chain is scheduled one task per step in order', () => {
    const size = 4_000;
    const result = order(
      Array.from({ length: size }, (_, i) => ({ id: `t${i}`, depends_on: i > 0 ? [`t${i - 1}`] : [] })),
      'risk_first'
    );

    assert.strictEqual(result.length, size);
    assert.ok(result.every((set, i) => set.taskIds.length === 1 && set.taskIds[0] === `t${i}`));
  });
});

describe('foundational_first strategy', () => {
  test('moves foundational work ahead of its ready peers', () => {
    const result = order(
      [
        { id: 'feat', title: 'Add login page' },
        { id: 'schema', title: 'Create user schema' },
        { id: 'docs', title: 'Write docs', depends_on: ['feat'] },
      ],
      'foundational_first'
    );

    assert.deepStrictEqual(ids(result), [['schema'], ['feat'], ['docs']]);
    assert.deepStrictEqual(result[0].basis, { kind: 'foundational', reasons: ['title:schema'] });
    assert.deepStrictEqual(result[1].basis, { kind: 'dependencies' });
  });

  test('never schedules foundational work before its dependencies', () => {
    const result = order(
      [
        { id: 'feat', title: 'Add login page' },
        { id: 'migrate', title: 'Run migration', depends_on: ['feat'] },
      ],
      'foundational_first'
    );
    assert.deepStrictEqual(ids(result), [['feat'], ['migrate']]);
  });
});

describe('parallel_maximizing strategy', () => {
  test('batches every independent ready task', () => {
    const result = order(
      [{ id: 'a' }, { id: 'b', depends_on: ['a'] }, { id: 'c' }, { id: 'd', depends_on: ['b'] }],
      'parallel_maximizing'
    );
    assert.deepStrictEqual(ids(result), [['a', 'c'], ['b'], ['d']]);
  });

  test('defers a conflicting task into a later batch', () => {
    const result = order(
      [
        { id: 'a', title: 'Edit src/app.ts' },
        { id: 'c', title: 'Refactor src/app.ts' },
        { id: 'b', title: 'Write tests', depends_on: ['a'] },
      ],
      'parallel_maximizing',
      true
    );

    assert.deepStrictEqual(ids(result), [['a'], ['c', 'b']]);
    assert.deepStrictEqual(result[1].basis, { kind: 'merged', layers: [1, 2] });
  });

  test('tasks on the longest chain go first', () => {
    const result = order(
      [
        { id: 'x', title: 'Update README.md' },
        { id: 'y', title: 'Rewrite README.md' },
        { id: 'z', depends_on: ['y'] },
      ],
      'parallel_maximizing',
      true
    );
    assert.deepStrictEqual(ids(result), [['y'], ['x', 'z']]);
  });
});

describe('enforceDependencyOrder', () => {
  const graph = buildDependencyGraph(ingestTasks([{ id: 'a' }, { id: 'b', depends_on: ['a'] }]).tasks);
  const set = (...taskIds: string[]): ReadySet => ({ taskIds, basis: { kind: 'dependencies' } });

  test('accepts a valid order', () => {
    assert.doesNotThrow(() => enforceDependencyOrder([set('a'), set('b')], graph, 'topological'));
  });

  test('rejects a task placed before its dependency', () => {
    assert.throws(
      () => enforceDependencyOrder([set('b'), set('a')], graph, 'risk_first'),
      (err: unknown) =>
        err instanceof StrategyInvariantError &&
        err.message === 'Strategy risk_first produced an invalid order at task b: scheduled before its dependency a'
    );
  });

  test('rejects a task sharing a set with its dependency', () => {
    assert.throws(() => enforceDependencyOrder([set('a', 'b')], graph, 'topological'), StrategyInvariantError);
  });

  test('rejects duplicates and omissions', () => {
    assert.throws(
      () => enforceDependencyOrder([set('a'), set('a'), set('b')], graph, 'topological'),
      (err: unknown) => err instanceof StrategyInvariantError && err.taskId === 'a'
    );
    assert.throws(
      () => enforceDependencyOrder([set('a')], graph, 'topological'),
      (err: unknown) =>
        err instanceof StrategyInvariantError && err.message.endsWith('task was never scheduled')
    );
  });
});
