/**
 * Network: layers applied in sequence, plus a squared-error loss
 *
 * Hidden layers use tanh; the last layer is linear.
 *
 * @module dagrad/network/network
 */

import { ArityMismatchError, UsageError } from "../core/errors.ts";
import { getLogger } from "../core/logger.ts";
import type { NetworkConfig } from "../core/types.ts";
import { DEFAULT_NETWORK_CONFIG } from "../core/types.ts";
import type { Node } from "../engine/node.ts";
import { zeroGrad as zeroGraph } from "../engine/backward.ts";
import { power, subtract, sum } from "../engine/ops.ts";
import { assertWidth } from "../initialization/parameters.ts";
import { assertRange, createSampler } from "../initialization/random.ts";
import { Layer } from "./layer.ts";
import type { Module } from "./module.ts";

export class Network implements Module {
  readonly layers: readonly Layer[];
  readonly config: NetworkConfig;

  /**
   * @param inputWidth Number of inputs per example
   * @param layerWidths Output width of each layer, last one is the network output
   *
   * @example
   * ```typescript
   * const net = new Network(2, [3, 3, 1], { seed: 7 });
   * const [y] = net.evaluate(leaves([0.5, -1]));
   * ```
   */
  constructor(
    readonly inputWidth: number,
    layerWidths: readonly number[],
    config: Partial<NetworkConfig> = {},
  ) {
    this.config = { ...DEFAULT_NETWORK_CONFIG, ...config };
    const { seed, initLow, initHigh } = this.config;

    assertWidth("Network input width", inputWidth);
    if (layerWidths.length === 0) {
      throw new UsageError("Network needs at least one layer");
    }
    layerWidths.forEach((w, i) => assertWidth(`Layer ${i} width`, w));
    assertRange(initLow, initHigh);

    const sampler = this.config.sampler ?? createSampler(seed);
    const range = { low: initLow, high: initHigh };
    const sizes = [inputWidth, ...layerWidths];
    const last = layerWidths.length - 1;

    this.layers = layerWidths.map(
      (width, i) => new Layer(sizes[i], width, i !== last, sampler, range),
    );

    getLogger().debug(
      `Built network ${sizes.join(" -> ")} with ${this.parameters().length} parameters`,
    );
  }

  get layerWidths(): number[] {
    return this.layers.map((l) => l.outputWidth);
  }

  get outputWidth(): number {
    return this.layers[this.layers.length - 1].outputWidth;
  }

  /**
   * Feed `inputs` through every layer
   */
  evaluate(inputs: readonly Node[]): Node[] {
    let out: readonly Node[] = inputs;
    for (const layer of this.layers) {
      out = layer.evaluate(out);
    }
    return [...out];
  }

  /**
   * Σ (evaluate(x)[0] - y)^2 over the batch, as a single root node
   *
   * An empty batch gives a zero leaf.
   */
  loss(batchInputs: readonly (readonly Node[])[], batchTargets: readonly Node[]): Node {
    if (batchInputs.length !== batchTargets.length) {
      throw new ArityMismatchError("Network.loss batch", batchInputs.length, batchTargets.length);
    }

    const terms = batchInputs.map((x, i) => power(subtract(this.evaluate(x)[0], batchTargets[i]), 2));
    return sum(terms);
  }

  parameters(): Node[] {
    return this.layers.flatMap((l) => l.parameters());
  }

  /**
   * Reset parameter gradients, and with `root` every node reachable from it
   *
   * Pass the loss root when calling backward() on it again.
   */
  zeroGrad(root?: Node): void {
    for (const l of this.layers) {
      l.zeroGrad();
    }
    if (root !== undefined) {
      zeroGraph(root);
    }
  }
}
