/**
 * dagrad Initialization Module
 *
 * Seeded sampling and parameter initialization.
 *
 * @module dagrad/initialization
 */

export {
  assertWidth,
  countParameters,
  initVector,
} from "./parameters.ts";

export {
  assertRange,
  createSampler,
  Mulberry32,
  type Sampler,
} from "./random.ts";
