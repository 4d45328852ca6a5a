/**
 * Forward replay and finite-difference gradient checking
 *
 * evaluate() recomputes a root's value from the recorded operations with
 * some node values swapped out. That is all a central difference needs, and
 * the recorded nodes are never touched.
 *
 * @module dagrad/engine/gradcheck
 */

import { getLogger } from "../core/logger.ts";
import type { GradientCheckConfig } from "../core/types.ts";
import { DEFAULT_GRADIENT_CHECK_CONFIG } from "../core/types.ts";
import { backward, topologicalOrder, zeroGrad } from "./backward.ts";
import type { Node } from "./node.ts";

/**
 * Per-node outcome of a gradient check
 */
export interface GradientCheckEntry {
  node: Node;
  /** Gradient from backward() */
  analytic: number;
  /** Central finite difference */
  numeric: number;
  /** |analytic - numeric| */
  error: number;
  ok: boolean;
}

export interface GradientCheckResult {
  ok: boolean;
  entries: GradientCheckEntry[];
}

/**
 * Recompute `root`'s value, replacing the value of any node in `overrides`
 *
 * Overrides for nodes the root does not depend on are ignored.
 */
export function evaluate(root: Node, overrides?: ReadonlyMap<Node, number>): number {
  const values = new Map<Node, number>();

  for (const node of topologicalOrder(root)) {
    const override = overrides?.get(node);
    values.set(node, override ?? recompute(node, values));
  }

  return read(values, root);
}

/**
 * Central difference of `root` with respect to `node`'s value
 */
export function numericGradient(
  root: Node,
  node: Node,
  epsilon: number = DEFAULT_GRADIENT_CHECK_CONFIG.epsilon,
): number {
  const plus = evaluate(root, new Map([[node, node.value + epsilon]]));
  const minus = evaluate(root, new Map([[node, node.value - epsilon]]));
  return (plus - minus) / (2 * epsilon);
}

/**
 * Compare backward() gradients against finite differences
 *
 * Zeroes the graph and runs backward(root) first, so any gradients already
 * on the graph are replaced.
 *
 * @example
 * ```typescript
 * const x = leaf(0.5);
 * const { ok } = checkGradients(tanh(multiply(x, x)), [x]);
 * ```
 */
export function checkGradients(
  root: Node,
  nodes: readonly Node[],
  config: Partial<GradientCheckConfig> = {},
): GradientCheckResult {
  const { epsilon, tolerance } = { ...DEFAULT_GRADIENT_CHECK_CONFIG, ...config };

  zeroGrad(root);
  backward(root);

  const entries = nodes.map((node): GradientCheckEntry => {
    const analytic = node.gradient;
    const numeric = numericGradient(root, node, epsilon);
    const error = Math.abs(analytic - numeric);
    return {
      node,
      analytic,
      numeric,
      error,
      ok: error <= tolerance * Math.max(1, Math.abs(numeric)),
    };
  });

  for (const entry of entries) {
    if (!entry.ok) {
      getLogger().warn(
        `Gradient mismatch at ${entry.node}: analytic=${entry.analytic}, numeric=${entry.numeric}`,
      );
    }
  }

  return { ok: entries.every((e) => e.ok), entries };
}

function recompute(node: Node, values: ReadonlyMap<Node, number>): number {
  const op = node.operation;
  switch (op.kind) {
    case "leaf":
      return node.value;
    case "add":
      return read(values, node.operands[0]) + read(values, node.operands[1]);
    case "multiply":
      return read(values, node.operands[0]) * read(values, node.operands[1]);
    case "power":
      return Math.pow(read(values, node.operands[0]), op.exponent);
    case "tanh":
      return Math.tanh(read(values, node.operands[0]));
    default: {
      const unreachable: never = op;
      throw new Error(`Unknown operation: ${JSON.stringify(unreachable)}`);
    }
  }
}

function read(values: ReadonlyMap<Node, number>, node: Node): number {
  const value = values.get(node);
  if (value === undefined) {
    throw new Error(`Node ${node.id} replayed before its operands`);
  }
  return value;
}
