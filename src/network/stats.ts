/**
 * Network Stats Helper
 *
 * @module dagrad/network/stats
 */

import { countParameters } from "../initialization/parameters.ts";
import type { Network } from "./network.ts";

/**
 * Network statistics object
 */
export interface NetworkStats {
  inputWidth: number;
  layerWidths: number[];
  numLayers: number;
  paramCount: number;
  /** Widths of the tanh layers (all but the last) */
  hiddenWidths: number[];
}

/**
 * Compute network statistics
 */
export function computeNetworkStats(network: Network): NetworkStats {
  const layerWidths = network.layerWidths;

  return {
    inputWidth: network.inputWidth,
    layerWidths,
    numLayers: layerWidths.length,
    paramCount: countParameters(network.inputWidth, layerWidths),
    hiddenWidths: layerWidths.slice(0, -1),
  };
}
