/**
 * Neuron: weighted sum plus bias, optionally squashed by tanh
 *
 * @module dagrad/network/neuron
 */

import { ArityMismatchError } from "../core/errors.ts";
import { leaf, type Node } from "../engine/node.ts";
import { add, multiply, tanh } from "../engine/ops.ts";
import { assertWidth, initVector } from "../initialization/parameters.ts";
import type { Sampler } from "../initialization/random.ts";
import type { InitRange, Module } from "./module.ts";

export class Neuron implements Module {
  readonly weights: readonly Node[];
  readonly bias: Node;
  readonly nonLinear: boolean;

  /**
   * Draws `inputWidth` weights and then the bias from `sampler`, one
   * independent sample each.
   */
  constructor(inputWidth: number, nonLinear: boolean, sampler: Sampler, range: InitRange) {
    assertWidth("Neuron input width", inputWidth);

    this.weights = initVector(sampler, inputWidth, range.low, range.high).map((v) => leaf(v));
    this.bias = leaf(sampler.sample(range.low, range.high));
    this.nonLinear = nonLinear;
  }

  get inputWidth(): number {
    return this.weights.length;
  }

  /**
   * bias + Σ w_i * x_i, through tanh when nonLinear
   */
  evaluate(inputs: readonly Node[]): Node {
    if (inputs.length !== this.weights.length) {
      throw new ArityMismatchError("Neuron.evaluate", this.weights.length, inputs.length);
    }

    let activation = this.bias;
    for (let i = 0; i < this.weights.length; i++) {
      activation = add(activation, multiply(this.weights[i], inputs[i]));
    }

    return this.nonLinear ? tanh(activation) : activation;
  }

  parameters(): Node[] {
    return [...this.weights, this.bias];
  }

  zeroGrad(): void {
    for (const p of this.parameters()) {
      p.gradient = 0;
    }
  }
}
