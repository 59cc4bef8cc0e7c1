import test from 'node:test';
import assert from 'node:assert/strict';
import { addStack, buildFlameGraph, createRootNode } from '../shared/flameGraph/index.js';
import type { FlameGraphNode, StackSample } from '../shared/flameGraph/index.js';

const scenario: StackSample[] = [
  { frames: ['main', 'foo'], value: 10 },
  { frames: ['main', 'bar'], value: 5 },
  { frames: ['main', 'foo'], value: 3 }
];

function depthOf(root: FlameGraphNode): number {
  let depth = 0;
  let node: FlameGraphNode | undefined = root;
  while (node && node.children.size > 0) {
    node = node.children.values().next().value;
    depth += 1;
  }
  return depth;
}

test('buildFlameGraph: merges shared prefixes and sums values', () => {
  const root = buildFlameGraph(scenario);

  assert.equal(root.name, 'root');
  assert.equal(root.value, 18);
  assert.deepEqual([...root.children.keys()], ['main']);
  const main = root.children.get('main');
  assert.equal(main?.value, 18);
  assert.deepEqual([...(main?.children.keys() ?? [])].sort(), ['bar', 'foo']);
  assert.equal(main?.children.get('foo')?.value, 13);
  assert.equal(main?.children.get('bar')?.value, 5);
});

test('buildFlameGraph: root value is the sum of all sample values', () => {
  const samples: StackSample[] = [
    { frames: ['a'], value: 7 },
    { frames: ['b', 'c', 'd'], value: 11 },
    { frames: [], value: 4 },
    { frames: ['a', 'x'], value: 0 }
  ];
  const root = buildFlameGraph(samples);
  assert.equal(root.value, 22);
  assert.equal(root.children.get('a')?.value, 7);
  assert.equal(root.children.get('a')?.children.get('x')?.value, 0);
});

test('buildFlameGraph: identical stacks produce one node per depth', () => {
  const root = buildFlameGraph([
    { frames: ['main', 'work'], value: 2 },
    { frames: ['main', 'work'], value: 2 }
  ]);
  assert.equal(root.children.size, 1);
  const main = root.children.get('main');
  assert.equal(main?.children.size, 1);
  assert.equal(main?.value, 4);
  assert.equal(main?.children.get('work')?.value, 4);
});

test('buildFlameGraph: a stack of k frames yields a chain of k nodes', () => {
  const root = buildFlameGraph([{ frames: ['a', 'b', 'c', 'd', 'e'], value: 1 }]);
  assert.equal(depthOf(root), 5);
});

test('buildFlameGraph: same name at different depths stays separate', () => {
  const root = buildFlameGraph([{ frames: ['f', 'f', 'f'], value: 3 }]);
  assert.equal(depthOf(root), 3);
  assert.equal(root.children.get('f')?.children.get('f')?.children.get('f')?.value, 3);
});

test('addStack: empty stack only touches the root', () => {
  const root = createRootNode();
  addStack(root, [], 9);
  assert.equal(root.value, 9);
  assert.equal(root.children.size, 0);
});

test('buildFlameGraph: no samples yields an empty root', () => {
  const root = buildFlameGraph([]);
  assert.equal(root.name, 'root');
  assert.equal(root.value, 0);
  assert.equal(root.children.size, 0);
});

test('buildFlameGraph: accumulates into a provided root', () => {
  const root = createRootNode();
  buildFlameGraph([{ frames: ['a'], value: 1 }], root);
  buildFlameGraph([{ frames: ['a'], value: 2 }], root);
  assert.equal(root.value, 3);
  assert.equal(root.children.get('a')?.value, 3);
});

test('addStack: very deep stacks do not overflow the call stack', () => {
  const frames = Array.from({ length: 100_000 }, (_, i) => `fn${i}`);
  const root = buildFlameGraph([{ frames, value: 1 }]);
  assert.equal(depthOf(root), 100_000);
  assert.equal(root.value, 1);
});
