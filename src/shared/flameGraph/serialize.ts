import { SerializationError } from './types.js';
import type { FlameGraphNode, SerializedFlameGraphNode } from './types.js';

// Unpaired UTF-16 surrogates cannot be encoded as UTF-8 on the way to the browser.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

type Frame = {
  node: FlameGraphNode;
  out: SerializedFlameGraphNode;
  pending: FlameGraphNode[]; // children still to visit, last one first
};

function byName(a: FlameGraphNode, b: FlameGraphNode): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function ensureEncodable(node: FlameGraphNode, ancestors: readonly Frame[]): void {
  let problem: string | undefined;
  if (LONE_SURROGATE.test(node.name)) {
    problem = 'Function name is not valid Unicode';
  } else if (!Number.isSafeInteger(node.value)) {
    problem = `Value ${node.value} is not a safe integer`;
  }
  if (problem) {
    throw new SerializationError(problem, [...ancestors.map(f => f.node.name), node.name]);
  }
}

function open(node: FlameGraphNode, ancestors: readonly Frame[]): Frame {
  ensureEncodable(node, ancestors);
  return {
    node,
    out: { name: node.name, value: node.value, children: [] },
    pending: Array.from(node.children.values()).sort(byName).reverse()
  };
}

/**
 * Converts the tree into plain nested objects. Children are sorted by name so the same tree always
 * produces the same output.
 *
 * @throws SerializationError when a node holds a name or value that cannot be encoded
 */
export function serializeFlameGraph(root: FlameGraphNode): SerializedFlameGraphNode {
  const top = open(root, []);
  const stack: Frame[] = [top];
  for (let frame = stack.at(-1); frame; frame = stack.at(-1)) {
    const next = frame.pending.pop();
    if (!next) {
      stack.pop();
      continue;
    }
    const child = open(next, stack);
    frame.out.children.push(child.out);
    stack.push(child);
  }
  return top.out;
}

export function stringifyFlameGraph(root: FlameGraphNode): string {
  return JSON.stringify(serializeFlameGraph(root));
}
