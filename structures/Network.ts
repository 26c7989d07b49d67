import type { Layer } from "./Layer";
import { InvalidConfigurationError, ShapeMismatchError } from "./errors";
import { type Vector, checkWidth } from "../nn";

// a layer instance may only ever live in one network
const ownedLayers = new WeakSet<Layer>();

/**
 * Ordered layer stack. forward() threads a vector through every layer and
 * remembers what each layer was fed; backward() consumes those inputs in
 * reverse to update parameters and propagate the gradient.
 */
export class Network {
  private readonly layers: readonly Layer[];
  // input of every layer from the last forward, network input first
  private cache: Vector[] | null = null;

  constructor(layers: Layer[]) {
    if (layers.length === 0) {
      throw new InvalidConfigurationError("Network requires at least one layer");
    }
    for (let i = 0; i < layers.length - 1; i++) {
      const produced = layers[i].outputWidth;
      const expected = layers[i + 1].inputWidth;
      if (produced !== expected) {
        throw new ShapeMismatchError(
          `Network layer ${i} (${layers[i].kind}) outputs width ${produced} but layer ${i + 1} (${layers[i + 1].kind}) expects ${expected}`
        );
      }
    }
    layers.forEach((layer, i) => {
      if (ownedLayers.has(layer) || layers.indexOf(layer) !== i) {
        throw new InvalidConfigurationError(
          `Network layer ${i} (${layer.kind}) already belongs to a network`
        );
      }
    });
    layers.forEach((layer) => ownedLayers.add(layer));
    this.layers = Object.freeze([...layers]);
  }

  get size(): number {
    return this.layers.length;
  }

  get inputWidth(): number {
    return this.layers[0].inputWidth;
  }

  get outputWidth(): number {
    return this.layers[this.layers.length - 1].outputWidth;
  }

  layerAt(index: number): Layer {
    const layer = this.layers[index];
    if (layer === undefined) {
      throw new RangeError(`Network has no layer at index ${index}`);
    }
    return layer;
  }

  parameterCount(): number {
    return this.layers.reduce((acc, layer) => acc + layer.parameterCount(), 0);
  }

  /** Inference only: leaves the backward cache alone. */
  output(input: Vector): Vector {
    checkWidth("Network.output", "input width", this.inputWidth, input);
    return this.layers.reduce((acc, layer) => layer.output(acc), input);
  }

  forward(input: Vector): Vector {
    checkWidth("Network.forward", "input width", this.inputWidth, input);
    const inputs: Vector[] = [];
    let current = input;
    for (const layer of this.layers) {
      inputs.push([...current]);
      current = layer.output(current);
    }
    this.cache = inputs;
    return current;
  }

  /**
   * Walks the layers last to first: each one is updated with the gradient
   * it received, then hands its input gradient to the layer before it.
   * The gradient left after the first layer has no consumer and is dropped.
   */
  backward(outputGradient: Vector, learningRate: number): void {
    const inputs = this.cache;
    if (inputs === null) {
      throw new Error("Network.backward requires a preceding forward pass");
    }
    checkWidth("Network.backward", "output gradient width", this.outputWidth, outputGradient);
    this.cache = null;

    let gradient = outputGradient;
    for (let i = this.layers.length - 1; i >= 0; i--) {
      const layer = this.layers[i];
      layer.update(inputs[i], gradient, learningRate);
      if (i > 0) {
        gradient = layer.inputGradient(inputs[i], gradient);
      }
    }
  }
}
