/**
 * Dense applies an affine transformation
 * y = W x + b
 *
 * each output neuron j is a weighted sum of every input plus its own bias:
 *   y_j = b_j + w_j1*x_1 + w_j2*x_2 + ... + w_jn*x_n
 * so W has one row per output neuron and one column per input.
 *
 * this is the only layer with trainable parameters. backprop through it is
 * the transpose product W^T g, and the parameter step is plain gradient descent:
 *   w_ji -= rate * g_j * x_i
 *   b_j  -= rate * g_j
 */
import { LayerComponent } from "./Layer";
import { InvalidConfigurationError, ShapeMismatchError } from "./errors";
import { type Rng, type Vector, dot, isPositiveInteger, randFloat } from "../nn";

export class Dense extends LayerComponent {
  readonly kind = "dense";
  readonly inputWidth: number;
  readonly outputWidth: number;
  private readonly _weights: number[][];
  private readonly _bias: number[];

  constructor(weights: number[][], bias: Vector) {
    super();
    if (weights.length === 0 || weights[0].length === 0) {
      throw new ShapeMismatchError("Dense expects a non-empty weight matrix");
    }
    const inputWidth = weights[0].length;
    weights.forEach((row, j) => {
      if (row.length !== inputWidth) {
        throw new ShapeMismatchError(
          `Dense expects every weight row to have ${inputWidth} columns, row ${j} has ${row.length}`
        );
      }
    });
    if (bias.length !== weights.length) {
      throw new ShapeMismatchError(
        `Dense expects bias length=${weights.length}, got ${bias.length}`
      );
    }
    this.inputWidth = inputWidth;
    this.outputWidth = weights.length;
    this._weights = weights.map((row) => [...row]);
    this._bias = [...bias];
  }

  /**
   * Every weight (row by row) and then every bias drawn independently from
   * uniform [-1, 1). Pass a seeded generator for reproducible weights.
   */
  static random(inputWidth: number, outputWidth: number, rng: Rng = Math.random): Dense {
    Dense.checkShape(inputWidth, outputWidth);
    const weights: number[][] = [];
    for (let j = 0; j < outputWidth; j++) {
      const row = new Array<number>(inputWidth);
      for (let i = 0; i < inputWidth; i++) {
        row[i] = randFloat(-1, 1, rng);
      }
      weights.push(row);
    }
    const bias = new Array<number>(outputWidth);
    for (let j = 0; j < outputWidth; j++) {
      bias[j] = randFloat(-1, 1, rng);
    }
    return new Dense(weights, bias);
  }

  static uniform(value: number, inputWidth: number, outputWidth: number): Dense {
    Dense.checkShape(inputWidth, outputWidth);
    const weights = Array.from({ length: outputWidth }, () =>
      new Array<number>(inputWidth).fill(value)
    );
    return new Dense(weights, new Array<number>(outputWidth).fill(value));
  }

  private static checkShape(inputWidth: number, outputWidth: number): void {
    if (!isPositiveInteger(inputWidth) || !isPositiveInteger(outputWidth)) {
      throw new InvalidConfigurationError(
        `Dense widths must be positive integers, got ${inputWidth}x${outputWidth}`
      );
    }
  }

  get weights(): number[][] {
    return this._weights.map((row) => [...row]);
  }

  get bias(): Vector {
    return [...this._bias];
  }

  output(input: Vector): Vector {
    this.checkInput("output", input);
    const out = new Array<number>(this.outputWidth);
    for (let j = 0; j < this.outputWidth; j++) {
      out[j] = dot(this._weights[j], input) + this._bias[j];
    }
    return out;
  }

  inputGradient(input: Vector, outputGradient: Vector): Vector {
    this.checkInput("inputGradient", input);
    this.checkOutputGradient("inputGradient", outputGradient);
    const result = new Array<number>(this.inputWidth).fill(0);
    for (let j = 0; j < this.outputWidth; j++) {
      const row = this._weights[j];
      for (let i = 0; i < this.inputWidth; i++) {
        result[i] += row[i] * outputGradient[j];
      }
    }
    return result;
  }

  update(input: Vector, outputGradient: Vector, learningRate: number): void {
    super.update(input, outputGradient, learningRate);
    for (let j = 0; j < this.outputWidth; j++) {
      const row = this._weights[j];
      for (let i = 0; i < this.inputWidth; i++) {
        row[i] -= learningRate * outputGradient[j] * input[i];
      }
      this._bias[j] -= learningRate * outputGradient[j];
    }
  }

  parameterCount(): number {
    return this.outputWidth * (this.inputWidth + 1);
  }
}
