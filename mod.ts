/**
 * dagrad - reverse-mode automatic differentiation over scalar DAGs
 *
 * Arithmetic on `Node`s records a computation graph as it runs. `backward`
 * walks that graph once in reverse topological order and leaves
 * d(root)/d(node) in every reachable node's `gradient`, summed over every
 * path, so values reused in several places get their full gradient.
 *
 * Key features:
 * - add / multiply / power / tanh / negate / subtract on scalar nodes
 * - Iterative topological backward pass (single visit per node)
 * - Neuron / Layer / Network builder with seeded initialization
 * - Finite-difference and TF.js reference gradient checks
 *
 * @example
 * ```typescript
 * import { backward, leaf, multiply, add, tanh } from "dagrad";
 *
 * const a = leaf(2), b = leaf(-3), c = leaf(10);
 * const f = tanh(add(multiply(a, b), c));
 * backward(f);
 * console.log(a.gradient, b.gradient, c.gradient);
 * ```
 *
 * @module dagrad
 */

// Core
export {
  getLogger,
  type Logger,
  resetLogger,
  setLogger,
  silentLogger,
} from "./src/core/logger.ts";
export { ArityMismatchError, UsageError } from "./src/core/errors.ts";
export {
  DEFAULT_GRADIENT_CHECK_CONFIG,
  DEFAULT_NETWORK_CONFIG,
  type GradientCheckConfig,
  type NetworkConfig,
  type Operation,
  type OperationKind,
} from "./src/core/types.ts";

// Autodiff engine
export {
  add,
  assertNode,
  backward,
  checkGradients,
  evaluate,
  type GradientCheckEntry,
  type GradientCheckResult,
  leaf,
  leaves,
  multiply,
  negate,
  Node,
  numericGradient,
  power,
  subtract,
  sum,
  tanh,
  topologicalOrder,
  zeroGrad,
} from "./src/engine/index.ts";

// Initialization
export {
  countParameters,
  createSampler,
  initVector,
  Mulberry32,
  type Sampler,
} from "./src/initialization/index.ts";

// Network builder
export {
  computeNetworkStats,
  type InitRange,
  Layer,
  type Module,
  Network,
  type NetworkStats,
  Neuron,
} from "./src/network/index.ts";

// TF.js bridge
export {
  dispose,
  getBackend,
  initTensorFlow,
  isInitialized,
  referenceGradients,
  replayGraph,
  tf,
  tidy,
} from "./src/tf/index.ts";
