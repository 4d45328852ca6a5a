/**
 * dagrad Network Builder
 *
 * Neurons, layers and networks composed from engine operations.
 *
 * @module dagrad/network
 */

export { Layer } from "./layer.ts";
export type { InitRange, Module } from "./module.ts";
export { Network } from "./network.ts";
export { Neuron } from "./neuron.ts";
export { computeNetworkStats, type NetworkStats } from "./stats.ts";
