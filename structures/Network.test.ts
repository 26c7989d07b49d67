import { describe, it, expect, vi } from "vitest";
import { Network } from "./Network";
import { Dense } from "./Dense";
import { Hyperbolic, Sigmoid } from "./Activation";
import type { Layer } from "./Layer";
import { SquaredError } from "./Loss";
import { InvalidConfigurationError, ShapeMismatchError } from "./errors";
import { createRng } from "../nn";

const xorShaped = (seed: number) => {
  const rng = createRng(seed);
  return new Network([
    Dense.random(2, 6, rng),
    new Hyperbolic(6),
    Dense.random(6, 1, rng),
    new Sigmoid(1)
  ]);
};

describe("Network construction", () => {
  it("exposes the widths at both ends", () => {
    const network = xorShaped(1);
    expect(network.size).toBe(4);
    expect(network.inputWidth).toBe(2);
    expect(network.outputWidth).toBe(1);
    expect(network.parameterCount()).toBe(18 + 7);
  });

  it("rejects incompatible adjacent widths", () => {
    expect(() => new Network([Dense.random(2, 3), new Hyperbolic(2)])).toThrow(ShapeMismatchError);
    expect(() => new Network([Dense.random(2, 3), new Hyperbolic(2)])).toThrow(
      "Network layer 0 (dense) outputs width 3 but layer 1 (tanh) expects 2"
    );
  });

  it("rejects an empty layer list", () => {
    expect(() => new Network([])).toThrow(InvalidConfigurationError);
  });

  it("refuses a layer that already belongs to a network", () => {
    const shared = new Sigmoid(2);
    new Network([Dense.random(2, 2), shared]);
    expect(() => new Network([Dense.random(3, 2), shared])).toThrow(InvalidConfigurationError);

    const twice = new Hyperbolic(2);
    expect(() => new Network([twice, twice])).toThrow(
      "Network layer 1 (tanh) already belongs to a network"
    );
  });

  it("leaves the layers usable after a rejected construction", () => {
    const dense = Dense.random(2, 3);
    expect(() => new Network([dense, new Sigmoid(2)])).toThrow(ShapeMismatchError);
    expect(() => new Network([dense, new Sigmoid(3)])).not.toThrow();
  });

  it("looks up layers by position", () => {
    const network = xorShaped(1);
    expect(network.layerAt(1).kind).toBe("tanh");
    expect(() => network.layerAt(4)).toThrow(RangeError);
  });
});

describe("Network.forward", () => {
  it("threads the input through every layer in order", () => {
    const first = new Dense([[1, 1]], [0]);
    const second = new Dense([[2]], [1]);
    const network = new Network([first, second]);
    expect(network.forward([1, 2])).toEqual([7]);
  });

  it("matches the cache-free inference path", () => {
    const network = xorShaped(5);
    expect(network.forward([1, 0])).toEqual(network.output([1, 0]));
  });

  it("rejects an input of the wrong width", () => {
    expect(() => xorShaped(1).forward([1, 0, 1])).toThrow(
      "Network.forward expects input width=2, got 3"
    );
    expect(() => xorShaped(1).output([1])).toThrow(ShapeMismatchError);
  });
});

describe("Network.backward", () => {
  it("updates each layer before asking it for the upstream gradient", () => {
    const first = new Dense([[1, 1]], [0]);
    const second = new Dense([[2]], [0]);
    const network = new Network([first, second]);

    network.forward([1, 1]);
    network.backward([1], 0.5);

    // second: w = 2 - 0.5 * 1 * 2 = 1, so it sends back a gradient of 1
    expect(second.weights).toEqual([[1]]);
    expect(second.bias).toEqual([-0.5]);
    expect(first.weights).toEqual([[0.5, 0.5]]);
    expect(first.bias).toEqual([-0.5]);
  });

  it("feeds every layer the input cached by forward, last layer first", () => {
    const calls: string[] = [];
    const probe = (name: string, width: number): Layer => ({
      kind: name,
      inputWidth: width,
      outputWidth: width,
      output: (input) => input.map((x) => x + 1),
      inputGradient: vi.fn((input: number[], gradient: number[]) => {
        calls.push(`${name}.inputGradient(${input})`);
        return gradient.map((g) => g * 2);
      }),
      update: vi.fn((input: number[]) => {
        calls.push(`${name}.update(${input})`);
      }),
      parameterCount: () => 0
    });
    const a = probe("a", 1);
    const b = probe("b", 1);
    const network = new Network([a, b]);

    expect(network.forward([1])).toEqual([3]);
    network.backward([0.5], 0.1);

    expect(calls).toEqual(["b.update(2)", "b.inputGradient(2)", "a.update(1)"]);
    expect(b.update).toHaveBeenCalledWith([2], [0.5], 0.1);
    expect(a.update).toHaveBeenCalledWith([1], [1], 0.1);
    expect(a.inputGradient).not.toHaveBeenCalled();
  });

  it("steps with the input as it was at forward time", () => {
    const layer = new Dense([[1]], [0]);
    const network = new Network([layer]);
    const x = [1];

    network.forward(x);
    x[0] = 100;
    network.backward([1], 0.1);

    expect(layer.weights).toEqual([[0.9]]);
    expect(layer.bias).toEqual([-0.1]);
  });

  it("keeps its own copy of what a pass-through layer hands on", () => {
    const passThrough: Layer = {
      kind: "identity",
      inputWidth: 1,
      outputWidth: 1,
      output: (input) => input,
      inputGradient: (_input, gradient) => gradient,
      update: () => {},
      parameterCount: () => 0
    };
    const layer = new Dense([[1]], [0]);
    const network = new Network([passThrough, layer]);
    const x = [1];

    network.forward(x);
    x[0] = 100;
    network.backward([1], 0.1);

    expect(layer.weights).toEqual([[0.9]]);
  });

  it("requires a forward pass before every backward pass", () => {
    const network = xorShaped(2);
    expect(() => network.backward([1], 0.1)).toThrow(
      "Network.backward requires a preceding forward pass"
    );
    network.forward([0, 1]);
    network.backward([1], 0.1);
    expect(() => network.backward([1], 0.1)).toThrow(Error);
  });

  it("rejects a gradient of the wrong width", () => {
    const network = xorShaped(2);
    network.forward([0, 1]);
    expect(() => network.backward([1, 1], 0.1)).toThrow(
      "Network.backward expects output gradient width=1, got 2"
    );
  });

  it("does not increase the loss on the pair it just stepped on", () => {
    const network = new Network([
      new Dense([[0.3, -0.8], [0.5, 0.1]], [0.2, -0.4]),
      new Hyperbolic(2),
      new Dense([[0.7, -0.6]], [0.05]),
      new Sigmoid(1)
    ]);
    const loss = new SquaredError();
    const input = [1.0, -0.5];
    const target = [1.0];

    const output = network.forward(input);
    const before = loss.loss(output, target);
    network.backward([output[0] - target[0]], 0.01);
    const after = loss.loss(network.output(input), target);

    expect(after).toBeLessThan(before);
  });
});
