/**
 * Seeded PRNG for Reproducible Initialization (mulberry32)
 *
 * The generator is an explicit object handed to whoever needs randomness,
 * so two networks built from the same seed get identical parameters and
 * tests never share hidden state.
 *
 * @module dagrad/initialization/random
 */

import { UsageError } from "../core/errors.ts";

/**
 * Source of uniform samples consumed by parameter initialization
 */
export interface Sampler {
  /** Uniform sample in (low, high] */
  sample(low: number, high: number): number;
}

/**
 * mulberry32 generator
 *
 * @example
 * ```typescript
 * const rng = new Mulberry32(42);
 * const w = rng.sample(0.01, 1.0); // same value on every run
 * ```
 */
export class Mulberry32 implements Sampler {
  private rngState: number;

  constructor(seed: number) {
    this.rngState = seed | 0; // Ensure integer
  }

  /**
   * Current internal state (for debugging/testing)
   */
  get state(): number {
    return this.rngState;
  }

  /**
   * Returns value in [0, 1)
   */
  next(): number {
    this.rngState = (this.rngState + 0x6D2B79F5) | 0;
    let t = Math.imul(this.rngState ^ (this.rngState >>> 15), 1 | this.rngState);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /**
   * Uniform sample in (low, high]
   *
   * Flipping next() to (0, 1] keeps `low` itself out of reach, so a range
   * starting just above zero never yields a zero weight.
   */
  sample(low: number, high: number): number {
    assertRange(low, high);
    return low + (1 - this.next()) * (high - low);
  }
}

/**
 * Create a seeded sampler
 */
export function createSampler(seed: number): Mulberry32 {
  return new Mulberry32(seed);
}

/**
 * Reject ranges that cannot produce a finite sample
 */
export function assertRange(low: number, high: number): void {
  if (!Number.isFinite(low) || !Number.isFinite(high) || !(low < high)) {
    throw new UsageError(`Invalid sampling range (${low}, ${high}]`);
  }
}
