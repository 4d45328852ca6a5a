/**
 * Usage errors raised at the boundary of the engine and network builder.
 *
 * Numeric anomalies (NaN from a fractional power of a negative base, for
 * instance) are never raised; they travel through the graph as values.
 *
 * @module dagrad/core/errors
 */

/**
 * Programmer error: the caller broke a precondition
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Thrown when two sequences that must line up have different lengths
 * (neuron inputs vs. weights, batch inputs vs. targets)
 */
export class ArityMismatchError extends UsageError {
  constructor(
    public readonly context: string,
    public readonly expected: number,
    public readonly received: number,
  ) {
    super(`${context}: expected ${expected} values, received ${received}`);
    this.name = "ArityMismatchError";
  }
}
