/**
 * dagrad Types and Configuration
 *
 * Shared type definitions and default configurations.
 *
 * @module dagrad/core/types
 */

import type { Sampler } from "../initialization/random.ts";

// ============================================================================
// Operations
// ============================================================================

/**
 * How a node was produced. Each variant carries exactly what its local
 * gradient rule needs.
 */
export type Operation =
  | { readonly kind: "leaf" }
  | { readonly kind: "add" }
  | { readonly kind: "multiply" }
  | { readonly kind: "power"; readonly exponent: number }
  | { readonly kind: "tanh" };

export type OperationKind = Operation["kind"];

// ============================================================================
// Network Configuration
// ============================================================================

/**
 * Network construction parameters
 */
export interface NetworkConfig {
  /** Seed for the parameter sampler. Ignored when `sampler` is given. Default: 42 */
  seed: number;
  /** Exclusive lower bound of the initial weight/bias range. Default: 0.01 */
  initLow: number;
  /** Inclusive upper bound of the initial weight/bias range. Default: 1.0 */
  initHigh: number;
  /** Ready-made sampler, shared with other networks if the caller wants */
  sampler?: Sampler;
}

export const DEFAULT_NETWORK_CONFIG: NetworkConfig = {
  seed: 42,
  initLow: 0.01,
  initHigh: 1.0,
};

// ============================================================================
// Gradient Check Configuration
// ============================================================================

/**
 * Finite-difference gradient check parameters
 */
export interface GradientCheckConfig {
  /** Half-width of the central difference. Default: 1e-6 */
  epsilon: number;
  /** Allowed |analytic - numeric|, scaled by max(1, |numeric|). Default: 1e-4 */
  tolerance: number;
}

export const DEFAULT_GRADIENT_CHECK_CONFIG: GradientCheckConfig = {
  epsilon: 1e-6,
  tolerance: 1e-4,
};
