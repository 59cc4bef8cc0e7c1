import { ROOT_NAME } from './types.js';
import type { FlameGraphNode, StackSample } from './types.js';

export function createNode(name: string): FlameGraphNode {
  return { name, value: 0, children: new Map() };
}

export function createRootNode(): FlameGraphNode {
  return createNode(ROOT_NAME);
}

// Walks the stack with a cursor instead of recursing so very deep stacks cannot exhaust the call stack.
export function addStack(root: FlameGraphNode, frames: readonly string[], value: number): void {
  let node = root;
  node.value += value;
  for (const name of frames) {
    let child = node.children.get(name);
    if (!child) {
      child = createNode(name);
      node.children.set(name, child);
    }
    child.value += value;
    node = child;
  }
}

export function buildFlameGraph(samples: Iterable<StackSample>, root: FlameGraphNode = createRootNode()): FlameGraphNode {
  for (const sample of samples) {
    addStack(root, sample.frames, sample.value);
  }
  return root;
}
