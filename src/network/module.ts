/**
 * Common surface of neurons, layers and networks
 *
 * @module dagrad/network/module
 */

import type { Node } from "../engine/node.ts";

export interface Module {
  /** Learnable leaves, in a stable order */
  parameters(): Node[];
  /**
   * Reset the gradient of every parameter
   *
   * Intermediate nodes of graphs built from this module keep theirs, so
   * running backward() again on an existing root also needs zeroGrad(root).
   */
  zeroGrad(): void;
}

/**
 * Initial parameter range, (low, high]
 */
export interface InitRange {
  low: number;
  high: number;
}
