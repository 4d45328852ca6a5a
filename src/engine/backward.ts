/**
 * Reverse-mode traversal
 *
 * backward(root) seeds d(root)/d(root) = 1, orders every reachable node so
 * that consumers come before their operands, and applies each node's local
 * chain rule once. Contributions are added to operand gradients, never
 * assigned, so a node reached along several paths ends up with the sum over
 * all of them.
 *
 * @module dagrad/engine/backward
 */

import { assertNode, type Node } from "./node.ts";

/**
 * All nodes reachable from `root`, operands before consumers, root last
 *
 * Iterative post-order DFS with a visited set keyed by node identity. Each
 * node appears exactly once however many consumers it has. The explicit
 * stack keeps long chains (a loss summed over a big batch is one) off the
 * call stack.
 */
export function topologicalOrder(root: Node): Node[] {
  assertNode(root, "topologicalOrder root");

  const order: Node[] = [];
  const visited = new Set<Node>([root]);
  const stack: Array<{ node: Node; next: number }> = [{ node: root, next: 0 }];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.next < frame.node.operands.length) {
      const operand = frame.node.operands[frame.next++];
      // Acyclic by construction: a visited operand is already in `order`
      if (!visited.has(operand)) {
        visited.add(operand);
        stack.push({ node: operand, next: 0 });
      }
    } else {
      stack.pop();
      order.push(frame.node);
    }
  }

  return order;
}

/**
 * Compute d(root)/d(node) for every node reachable from `root`
 *
 * Not idempotent: gradients left over from an earlier pass are added to,
 * so call zeroGrad(root) before running it again on the same graph.
 *
 * @returns `root`, for chaining
 */
export function backward(root: Node): Node {
  const order = topologicalOrder(root);

  root.gradient = 1;
  for (let i = order.length - 1; i >= 0; i--) {
    propagate(order[i]);
  }

  return root;
}

/**
 * Reset the gradient of every node reachable from `root`
 */
export function zeroGrad(root: Node): void {
  for (const node of topologicalOrder(root)) {
    node.gradient = 0;
  }
}

/**
 * Push a node's gradient into its operands using its local derivative
 */
function propagate(node: Node): void {
  const op = node.operation;
  const g = node.gradient;

  switch (op.kind) {
    case "leaf":
      return;
    case "add": {
      const [a, b] = node.operands;
      a.gradient += g;
      b.gradient += g;
      return;
    }
    case "multiply": {
      const [a, b] = node.operands;
      a.gradient += b.value * g;
      b.gradient += a.value * g;
      return;
    }
    case "power": {
      const [a] = node.operands;
      a.gradient += op.exponent * Math.pow(a.value, op.exponent - 1) * g;
      return;
    }
    case "tanh": {
      // d tanh(x)/dx = 1 - tanh(x)^2, taken from this node's own output
      const [a] = node.operands;
      a.gradient += (1 - node.value * node.value) * g;
      return;
    }
    default: {
      const unreachable: never = op;
      throw new Error(`Unknown operation: ${JSON.stringify(unreachable)}`);
    }
  }
}
