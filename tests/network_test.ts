/**
 * Network builder tests
 *
 * Shapes, parameter bookkeeping, loss construction and gradients flowing
 * back into parameters.
 *
 * @module dagrad/tests/network_test
 */

import { afterEach, beforeEach, expect, test, vi } from "vitest";
import {
  ArityMismatchError,
  backward,
  checkGradients,
  computeNetworkStats,
  createSampler,
  Layer,
  leaf,
  leaves,
  Network,
  Neuron,
  resetLogger,
  setLogger,
  silentLogger,
  topologicalOrder,
  UsageError,
} from "../mod.ts";

// =============================================================================
// Test Fixtures
// =============================================================================

const RANGE = { low: 0.01, high: 1.0 };

function createXorBatch() {
  return {
    inputs: [[0, 0], [0, 1], [1, 0], [1, 1]].map((x) => leaves(x)),
    targets: leaves([0, 1, 1, 0]),
  };
}

beforeEach(() => {
  setLogger(silentLogger);
});

afterEach(() => {
  resetLogger();
});

// =============================================================================
// Neuron
// =============================================================================

test("Neuron - holds one weight per input plus a bias", () => {
  const n = new Neuron(6, true, createSampler(42), RANGE);

  expect(n.weights.length).toBe(6);
  expect(n.inputWidth).toBe(6);
  expect(n.parameters().length).toBe(7);
  expect(n.parameters()[6]).toBe(n.bias);
});

test("Neuron - samples every weight independently", () => {
  const n = new Neuron(6, true, createSampler(42), RANGE);
  const values = n.parameters().map((p) => p.value);

  expect(new Set(values).size).toBe(7);
  for (const v of values) {
    expect(v).toBeGreaterThan(0.01);
    expect(v).toBeLessThanOrEqual(1.0);
  }
});

test("Neuron - evaluate computes tanh(bias + w . x)", () => {
  const n = new Neuron(3, true, createSampler(1), RANGE);
  const x = leaves([0.5, -1, 2]);

  let expected = n.bias.value;
  n.weights.forEach((w, i) => {
    expected += w.value * x[i].value;
  });

  const out = n.evaluate(x);

  expect(out.value).toBe(Math.tanh(expected));
  expect(out.operation.kind).toBe("tanh");
  expect(out.gradient).toBe(0);
});

test("Neuron - linear neuron skips tanh", () => {
  const n = new Neuron(2, false, createSampler(1), RANGE);
  const x = leaves([1, 1]);

  const out = n.evaluate(x);

  expect(out.operation.kind).toBe("add");
  expect(out.value).toBe(n.bias.value + n.weights[0].value + n.weights[1].value);
});

test("Neuron - input length mismatch is rejected", () => {
  const n = new Neuron(3, true, createSampler(1), RANGE);

  expect(() => n.evaluate(leaves([1, 2]))).toThrow(ArityMismatchError);
  expect(() => n.evaluate(leaves([1, 2]))).toThrow(
    "Neuron.evaluate: expected 3 values, received 2",
  );
});

test("Neuron - gradients reach weights, bias and inputs", () => {
  const n = new Neuron(2, false, createSampler(5), RANGE);
  const x = leaves([3, -2]);

  backward(n.evaluate(x));

  expect(n.bias.gradient).toBe(1);
  expect(n.weights[0].gradient).toBe(3);
  expect(n.weights[1].gradient).toBe(-2);
  expect(x[0].gradient).toBe(n.weights[0].value);
  expect(x[1].gradient).toBe(n.weights[1].value);
});

test("Neuron - zeroGrad clears parameter gradients", () => {
  const n = new Neuron(2, true, createSampler(5), RANGE);
  backward(n.evaluate(leaves([1, 1])));

  n.zeroGrad();

  expect(n.parameters().every((p) => p.gradient === 0)).toBe(true);
});

test("Neuron - zero input width is rejected", () => {
  expect(() => new Neuron(0, true, createSampler(1), RANGE)).toThrow(UsageError);
});

// =============================================================================
// Layer
// =============================================================================

test("Layer - one output per neuron", () => {
  const layer = new Layer(3, 4, true, createSampler(2), RANGE);

  const out = layer.evaluate(leaves([1, 2, 3]));

  expect(out.length).toBe(4);
  expect(layer.outputWidth).toBe(4);
  expect(layer.parameters().length).toBe(4 * (3 + 1));
});

test("Layer - neurons do not share initial values", () => {
  const layer = new Layer(2, 3, true, createSampler(2), RANGE);
  const biases = layer.neurons.map((n) => n.bias.value);

  expect(new Set(biases).size).toBe(3);
});

// =============================================================================
// Network
// =============================================================================

test("Network - 2 -> [3, 3, 1] has one output and 25 parameters", () => {
  const net = new Network(2, [3, 3, 1]);

  const out = net.evaluate(leaves([0.5, -0.5]));

  expect(out.length).toBe(1);
  expect(net.parameters().length).toBe(25);
  expect(net.layers.length).toBe(3);
  expect(net.layerWidths).toEqual([3, 3, 1]);
  expect(net.outputWidth).toBe(1);
});

test("Network - hidden layers are tanh, the last layer is linear", () => {
  const net = new Network(2, [3, 3, 1]);

  expect(net.layers.map((l) => l.nonLinear)).toEqual([true, true, false]);
  expect(net.evaluate(leaves([1, 0]))[0].operation.kind).toBe("add");
});

test("Network - same seed gives the same parameters", () => {
  const a = new Network(2, [3, 1], { seed: 7 });
  const b = new Network(2, [3, 1], { seed: 7 });
  const c = new Network(2, [3, 1], { seed: 8 });

  const values = (net: Network) => net.parameters().map((p) => p.value);

  expect(values(a)).toEqual(values(b));
  expect(values(a)).not.toEqual(values(c));
});

test("Network - an explicit sampler takes precedence over the seed", () => {
  const a = new Network(2, [2], { seed: 1, sampler: createSampler(99) });
  const b = new Network(2, [2], { seed: 2, sampler: createSampler(99) });

  expect(a.parameters().map((p) => p.value)).toEqual(b.parameters().map((p) => p.value));
});

test("Network - initial range comes from config", () => {
  const net = new Network(3, [4, 2], { initLow: -0.5, initHigh: 0.5 });

  for (const p of net.parameters()) {
    expect(p.value).toBeGreaterThan(-0.5);
    expect(p.value).toBeLessThanOrEqual(0.5);
  }
});

test("Network - invalid shapes are rejected", () => {
  expect(() => new Network(2, [])).toThrow("Network needs at least one layer");
  expect(() => new Network(0, [1])).toThrow(UsageError);
  expect(() => new Network(2, [3, 0])).toThrow("Layer 1 width must be a positive integer, got 0");
  expect(() => new Network(2, [1.5])).toThrow(UsageError);
  expect(() => new Network(2, [1], { initLow: 1, initHigh: 0 })).toThrow(UsageError);
});

test("Network - logs construction through the installed logger", () => {
  const logger = { ...silentLogger, debug: vi.fn() };
  setLogger(logger);

  new Network(2, [1]);

  expect(logger.debug).toHaveBeenCalledWith("Built network 2 -> 1 with 3 parameters");
});

// =============================================================================
// Loss
// =============================================================================

test("loss - sum of squared errors over the batch", () => {
  const net = new Network(2, [3, 3, 1]);
  const { inputs, targets } = createXorBatch();

  const loss = net.loss(inputs, targets);

  let expected = 0;
  inputs.forEach((x, i) => {
    expected += (net.evaluate(x)[0].value - targets[i].value) ** 2;
  });
  expect(loss.value).toBeCloseTo(expected, 12);
});

test("loss - never negative", () => {
  for (const seed of [1, 2, 3, 4, 5]) {
    const net = new Network(2, [4, 1], { seed, initLow: -1, initHigh: 1 });
    const { inputs, targets } = createXorBatch();

    expect(net.loss(inputs, targets).value).toBeGreaterThanOrEqual(0);
  }
});

test("loss - empty batch is zero", () => {
  const net = new Network(2, [1]);

  const loss = net.loss([], []);

  expect(loss.value).toBe(0);
  expect(loss.isLeaf).toBe(true);
});

test("loss - batch length mismatch is rejected", () => {
  const net = new Network(2, [1]);

  expect(() => net.loss([leaves([0, 0])], [leaf(0), leaf(1)])).toThrow(ArityMismatchError);
});

test("loss - backward fills every parameter gradient", () => {
  const net = new Network(2, [3, 3, 1]);
  const { inputs, targets } = createXorBatch();

  backward(net.loss(inputs, targets));

  const grads = net.parameters().map((p) => p.gradient);
  expect(grads.every((g) => Number.isFinite(g))).toBe(true);
  expect(grads.some((g) => g !== 0)).toBe(true);
});

test("loss - parameter gradients match finite differences", () => {
  const net = new Network(2, [3, 3, 1]);
  const { inputs, targets } = createXorBatch();
  const loss = net.loss(inputs, targets);

  const result = checkGradients(loss, net.parameters());

  expect(result.ok).toBe(true);
  expect(result.entries.length).toBe(25);
});

test("Network - zeroGrad clears every parameter", () => {
  const net = new Network(2, [3, 1]);
  const { inputs, targets } = createXorBatch();
  backward(net.loss(inputs, targets));

  net.zeroGrad();

  expect(net.parameters().every((p) => p.gradient === 0)).toBe(true);
});

test("Network - zeroGrad with the loss root allows a repeated backward", () => {
  const net = new Network(2, [3, 1]);
  const { inputs, targets } = createXorBatch();
  const loss = net.loss(inputs, targets);

  backward(loss);
  const first = net.parameters().map((p) => p.gradient);

  net.zeroGrad(loss);
  expect(topologicalOrder(loss).every((n) => n.gradient === 0)).toBe(true);

  backward(loss);
  expect(net.parameters().map((p) => p.gradient)).toEqual(first);
});

test("Network - zeroGrad without a root clears parameters only", () => {
  const net = new Network(2, [3, 1]);
  const { inputs, targets } = createXorBatch();
  const loss = net.loss(inputs, targets);
  backward(loss);

  net.zeroGrad();

  expect(net.parameters().every((p) => p.gradient === 0)).toBe(true);
  expect(loss.gradient).toBe(1);
});

// =============================================================================
// Stats
// =============================================================================

test("computeNetworkStats - reports shape and parameter count", () => {
  const stats = computeNetworkStats(new Network(2, [3, 3, 1]));

  expect(stats).toEqual({
    inputWidth: 2,
    layerWidths: [3, 3, 1],
    numLayers: 3,
    paramCount: 25,
    hiddenWidths: [3, 3],
  });
});
