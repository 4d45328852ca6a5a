/**
 * TensorFlow.js Backend for dagrad
 *
 * TF.js is only used to cross-check engine gradients, so the pure-JS CPU
 * backend is the default: it needs no native build and computes the same
 * gradients as any other backend, in float32.
 *
 * @module dagrad/tf/backend
 */

import * as tf from "@tensorflow/tfjs";
import { getLogger } from "../core/logger.ts";

// Re-export tf for use throughout the codebase
export { tf };

// Backend state
let initialized = false;
let currentBackend: string = "cpu";
let initPromise: Promise<string> | null = null;

/**
 * Initialize TensorFlow.js
 *
 * Concurrent and repeated calls share the first initialization.
 *
 * @param preferredBackend Backend to try first; falls back to cpu
 * @returns The backend that was selected
 *
 * @example
 * ```typescript
 * const backend = await initTensorFlow();
 * ```
 */
export function initTensorFlow(preferredBackend?: "cpu" | "webgl"): Promise<string> {
  if (!initPromise) {
    initPromise = selectBackend(preferredBackend);
  }
  return initPromise;
}

async function selectBackend(preferredBackend?: "cpu" | "webgl"): Promise<string> {
  await tf.ready();

  const backends = preferredBackend && preferredBackend !== "cpu"
    ? [preferredBackend, "cpu"]
    : ["cpu"];

  for (const backend of backends) {
    // setBackend resolves false when the backend is missing or fails to init
    if (await tf.setBackend(backend)) {
      break;
    }
  }

  initialized = true;
  currentBackend = tf.getBackend();
  getLogger().info(`TF.js backend: ${currentBackend}`);

  return currentBackend;
}

/**
 * Get current backend name
 */
export function getBackend(): string {
  return currentBackend;
}

/**
 * Check if TensorFlow.js is initialized
 */
export function isInitialized(): boolean {
  return initialized;
}

/**
 * Run a function within tf.tidy() for automatic cleanup
 */
export function tidy<T extends tf.TensorContainer>(fn: () => T): T {
  return tf.tidy(fn);
}

/**
 * Dispose tensors safely
 */
export function dispose(tensors: tf.Tensor | tf.Tensor[] | null | undefined): void {
  if (!tensors) return;
  if (Array.isArray(tensors)) {
    tensors.forEach((t) => t.dispose());
  } else {
    tensors.dispose();
  }
}
