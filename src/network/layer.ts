/**
 * Layer: neurons sharing one input vector
 *
 * @module dagrad/network/layer
 */

import type { Node } from "../engine/node.ts";
import { assertWidth } from "../initialization/parameters.ts";
import type { Sampler } from "../initialization/random.ts";
import type { InitRange, Module } from "./module.ts";
import { Neuron } from "./neuron.ts";

export class Layer implements Module {
  readonly neurons: readonly Neuron[];

  constructor(
    readonly inputWidth: number,
    outputWidth: number,
    readonly nonLinear: boolean,
    sampler: Sampler,
    range: InitRange,
  ) {
    assertWidth("Layer output width", outputWidth);
    this.neurons = Array.from(
      { length: outputWidth },
      () => new Neuron(inputWidth, nonLinear, sampler, range),
    );
  }

  get outputWidth(): number {
    return this.neurons.length;
  }

  /** One output node per neuron, all built from the same inputs */
  evaluate(inputs: readonly Node[]): Node[] {
    return this.neurons.map((n) => n.evaluate(inputs));
  }

  parameters(): Node[] {
    return this.neurons.flatMap((n) => n.parameters());
  }

  zeroGrad(): void {
    for (const n of this.neurons) {
      n.zeroGrad();
    }
  }
}
