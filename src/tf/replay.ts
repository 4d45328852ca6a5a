/**
 * Engine graph replay through TensorFlow.js
 *
 * Rebuilds a recorded graph as TF.js scalar ops so tf.grads can compute
 * reference gradients independently of the engine's own backward pass.
 * TF.js runs in float32, so compare with a tolerance around 1e-4.
 *
 * @module dagrad/tf/replay
 */

import { UsageError } from "../core/errors.ts";
import { topologicalOrder } from "../engine/backward.ts";
import type { Node } from "../engine/node.ts";
import { isInitialized, tf, tidy } from "./backend.ts";

/**
 * Build `root` from TF.js ops
 *
 * Nodes listed in `inputs` read from the matching entry of `tensors`; every
 * other leaf becomes a constant scalar. Must run inside tidy() or a
 * gradient function, which own the intermediate tensors.
 */
export function replayGraph(
  root: Node,
  inputs: readonly Node[],
  tensors: readonly tf.Tensor[],
): tf.Scalar {
  if (inputs.length !== tensors.length) {
    throw new UsageError(
      `replayGraph: ${inputs.length} input nodes but ${tensors.length} tensors`,
    );
  }

  const built = new Map<Node, tf.Tensor>();
  inputs.forEach((node, i) => built.set(node, tensors[i]));

  for (const node of topologicalOrder(root)) {
    if (built.has(node)) continue;
    built.set(node, toTensor(node, built));
  }

  return lookup(built, root).asScalar();
}

/**
 * d(root)/d(node) for each node in `inputs`, computed by TF.js
 *
 * Nodes the root does not depend on get 0, as they would from backward().
 * Requires initTensorFlow() to have completed.
 */
export function referenceGradients(root: Node, inputs: readonly Node[]): number[] {
  if (!isInitialized()) {
    throw new UsageError("referenceGradients called before initTensorFlow()");
  }

  // tf.grads rejects inputs that do not lead to the output
  const reachable = new Set(topologicalOrder(root));
  const live = [...new Set(inputs)].filter((n) => reachable.has(n));
  if (live.length === 0) return inputs.map(() => 0);

  const byNode = new Map<Node, number>();
  tidy(() => {
    const f = (...xs: tf.Tensor[]) => replayGraph(root, live, xs);
    const grads = tf.grads(f)(live.map((n) => tf.scalar(n.value)));
    grads.forEach((g, i) => byNode.set(live[i], g.dataSync()[0]));
  });

  return inputs.map((n) => byNode.get(n) ?? 0);
}

function toTensor(node: Node, built: ReadonlyMap<Node, tf.Tensor>): tf.Tensor {
  const op = node.operation;
  switch (op.kind) {
    case "leaf":
      return tf.scalar(node.value);
    case "add":
      return tf.add(lookup(built, node.operands[0]), lookup(built, node.operands[1]));
    case "multiply":
      return tf.mul(lookup(built, node.operands[0]), lookup(built, node.operands[1]));
    case "power":
      return tf.pow(lookup(built, node.operands[0]), tf.scalar(op.exponent));
    case "tanh":
      return tf.tanh(lookup(built, node.operands[0]));
    default: {
      const unreachable: never = op;
      throw new Error(`Unknown operation: ${JSON.stringify(unreachable)}`);
    }
  }
}

function lookup(built: ReadonlyMap<Node, tf.Tensor>, node: Node): tf.Tensor {
  const tensor = built.get(node);
  if (!tensor) {
    throw new Error(`Node ${node.id} replayed before its operands`);
  }
  return tensor;
}
