/**
 * dagrad Autodiff Engine
 *
 * Scalar nodes, graph-recording operations and the reverse-mode pass.
 *
 * @module dagrad/engine
 */

export { assertNode, leaf, leaves, Node } from "./node.ts";
export { add, multiply, negate, power, subtract, sum, tanh } from "./ops.ts";
export { backward, topologicalOrder, zeroGrad } from "./backward.ts";
export {
  checkGradients,
  evaluate,
  type GradientCheckEntry,
  type GradientCheckResult,
  numericGradient,
} from "./gradcheck.ts";
