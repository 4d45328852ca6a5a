/**
 * Graph-recording arithmetic
 *
 * Each operation computes its value right away and returns a new node that
 * remembers the operation and its operands. Gradients stay at zero until
 * backward() runs.
 *
 * @module dagrad/engine/ops
 */

import { leaf, Node } from "./node.ts";

export function add(a: Node, b: Node): Node {
  return new Node(a.value + b.value, { kind: "add" }, [a, b]);
}

export function multiply(a: Node, b: Node): Node {
  return new Node(a.value * b.value, { kind: "multiply" }, [a, b]);
}

/**
 * Raise to a fixed real exponent
 *
 * A fractional power of a negative base is NaN, and the NaN simply flows on
 * through the graph. The gradient n * a^(n-1) is NaN at a = 0 for n = 0
 * (0 * Infinity).
 */
export function power(a: Node, exponent: number): Node {
  return new Node(Math.pow(a.value, exponent), { kind: "power", exponent }, [a]);
}

export function tanh(a: Node): Node {
  return new Node(Math.tanh(a.value), { kind: "tanh" }, [a]);
}

/** -a, recorded as a * (-1) */
export function negate(a: Node): Node {
  return multiply(a, leaf(-1));
}

/** a - b, recorded as a + (-b) */
export function subtract(a: Node, b: Node): Node {
  return add(a, negate(b));
}

/**
 * Fold `add` over the nodes starting from a zero leaf
 *
 * The empty sum is a zero leaf.
 */
export function sum(nodes: readonly Node[]): Node {
  return nodes.reduce<Node>((acc, n) => add(acc, n), leaf(0));
}
