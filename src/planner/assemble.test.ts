import assert from 'node:assert';
import { describe, test } from 'node:test';
import type { SplitGroup } from '../conflicts/splitter.js';
import { buildDependencyGraph } from '../graph/builder.js';
import { ingestTasks } from '../tasks/intake.js';
import type { ExecutionGroup } from '../types/index.js';
import { assemblePlan, computeConfidence, describeBasis, toExecutionGroups } from './assemble.js';
import { simplifyPlan } from './document.js';

const graph = buildDependencyGraph(
  ingestTasks([
    { id: 'a', title: 'Alpha', priority: 1 },
    { id: 'b', title: 'Beta', priority: 2 },
    { id: 'c', title: 'Gamma', depends_on: ['a'] },
  ]).tasks
);

const group = (...taskIds: string[]): SplitGroup => ({ taskIds, basis: { kind: 'dependencies' } });

describe('toExecutionGroups', () => {
  test('numbers groups from one and classifies by size', () => {
    const groups = toExecutionGroups([group('a', 'b'), group('c')]);
    assert.deepStrictEqual(
      groups.map((g) => [g.index, g.kind]),
      [
        [1, 'parallel'],
        [2, 'sequential'],
      ]
    );
  });
});

describe('computeConfidence', () => {
  const execution = (...sizes: number[]): ExecutionGroup[] =>
    toExecutionGroups(sizes.map((size, i) => group(...Array.from({ length: size }, (_, j) => `t${i}-${j}`))));

  test('empty plans have no confidence', () => {
    assert.strictEqual(computeConfidence([]), 0);
  });

  test('rewards parallel groups', () => {
    assert.strictEqual(computeConfidence(execution(2, 1)), 0.9);
  });

  test('caps the parallel bonus', () => {
    assert.strictEqual(computeConfidence(execution(2, 2, 2)), 1);
  });

  test('penalises mostly sequential plans', () => {
    assert.strictEqual(computeConfidence(execution(1, 1, 1)), 0.7);
  });
});

describe('describeBasis', () => {
  test('spells out each placement reason', () => {
    assert.strictEqual(describeBasis({ kind: 'dependencies' }), 'dependencies satisfied');
    assert.strictEqual(describeBasis({ kind: 'priority', priority: 0 }), 'priority class P0');
    assert.strictEqual(
      describeBasis({ kind: 'foundational', reasons: ['title:schema', 'type:chore'] }),
      'foundational work first (title:schema, type:chore)'
    );
    assert.strictEqual(describeBasis({ kind: 'merged', layers: [1, 2] }), 'merged layers 1, 2');
  });
});

describe('assemblePlan', () => {
  test('computes stats and rationale', () => {
    const plan = assemblePlan('topological', [group('a', 'b'), group('c')], graph);

    assert.deepStrictEqual(plan.sequence, [['a', 'b'], ['c']]);
    assert.strictEqual(plan.totalTasks, 3);
    assert.strictEqual(plan.totalGroups, 2);
    assert.strictEqual(plan.parallelizableGroups, 1);
    assert.strictEqual(plan.criticalPathLength, 2);
    assert.strictEqual(plan.confidence, 0.9);
    assert.deepStrictEqual(Object.keys(plan.tasks), ['a', 'b', 'c']);
    assert.strictEqual(
      plan.rationale,
      [
        'Strategy: topological (Dependency order only; every ready layer runs as one batch)',
        '',
        'Group 1: [P:Group-1] 2 parallel tasks; dependencies satisfied',
        '  - a: Alpha (P1)',
        '  - b: Beta (P2)',
        'Group 2: [c] Gamma (P4) - sequential; dependencies satisfied',
      ].join('\n')
    );
  });

  test('rationale names conflict splits', () => {
    const plan = assemblePlan(
      'risk_first',
      [
        { taskIds: ['a'], basis: { kind: 'priority', priority: 1 }, split: { part: 1, parts: 2, resources: ['src/x.ts'] } },
        { taskIds: ['b'], basis: { kind: 'priority', priority: 1 }, split: { part: 2, parts: 2, resources: ['src/x.ts'] } },
        { taskIds: ['c'], basis: { kind: 'priority', priority: 4 } },
      ],
      graph
    );

    const lines = plan.rationale.split('\n');
    assert.strictEqual(
      lines[0],
      'Strategy: risk_first (Most urgent priority class first among tasks whose dependencies are met)'
    );
    assert.strictEqual(
      lines[2],
      'Group 1: [a] Alpha (P1) - sequential; priority class P1; conflict split 1/2 on src/x.ts'
    );
    assert.strictEqual(lines[4], 'Group 3: [c] Gamma (P4) - sequential; priority class P4');
    assert.deepStrictEqual(plan.groups[1].split, { part: 2, parts: 2, resources: ['src/x.ts'] });
  });

  test('task details keep ids that clash with object prototype keys', () => {
    const odd = buildDependencyGraph(ingestTasks([{ id: '__proto__', title: 'Odd' }]).tasks);
    const plan = assemblePlan('topological', [group('__proto__')], odd);

    assert.deepStrictEqual(Object.keys(plan.tasks), ['__proto__']);
    assert.strictEqual(Object.getPrototypeOf(plan.tasks), Object.prototype);
    assert.strictEqual(simplifyPlan(plan).groups[0].tasks[0].title, 'Odd');
  });

  test('empty plans say so', () => {
    const plan = assemblePlan('topological', [], buildDependencyGraph([]));
    assert.strictEqual(plan.totalTasks, 0);
    assert.strictEqual(plan.criticalPathLength, 0);
    assert.strictEqual(plan.confidence, 0);
    assert.strictEqual(
      plan.rationale,
      'Strategy: topological (Dependency order only; every ready layer runs as one batch)\n\nNo open tasks to schedule.'
    );
  });
});
