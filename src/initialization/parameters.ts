/**
 * Parameter Initialization Module
 *
 * Draws initial weight/bias values and counts parameters for a layer stack.
 * Every value is sampled independently; nothing is duplicated across
 * weights, neurons or layers.
 *
 * @module dagrad/initialization/parameters
 */

import { UsageError } from "../core/errors.ts";
import type { Sampler } from "./random.ts";

/**
 * Initialize a vector of independent samples in (low, high]
 */
export function initVector(sampler: Sampler, size: number, low: number, high: number): number[] {
  return Array.from({ length: size }, () => sampler.sample(low, high));
}

/**
 * Check that a width is a positive integer
 *
 * @param what Used in the error message ("input width", "layer 2 width", ...)
 */
export function assertWidth(what: string, width: number): void {
  if (!Number.isInteger(width) || width < 1) {
    throw new UsageError(`${what} must be a positive integer, got ${width}`);
  }
}

/**
 * Count learnable parameters of a fully-connected layer stack
 *
 * Each layer of width `n` fed by `m` inputs holds `n * m` weights and `n`
 * biases.
 *
 * @example
 * ```typescript
 * countParameters(2, [3, 3, 1]); // 9 + 12 + 4 = 25
 * ```
 */
export function countParameters(inputWidth: number, layerWidths: readonly number[]): number {
  let count = 0;
  let fanIn = inputWidth;
  for (const width of layerWidths) {
    count += width * (fanIn + 1);
    fanIn = width;
  }
  return count;
}
