import { type Vector, checkWidth } from "../nn";

/**
 * Anything that can sit in a Network. Built-in layers extend LayerComponent,
 * but the network only relies on this shape.
 */
export interface Layer {
  readonly kind: string;
  readonly inputWidth: number;
  readonly outputWidth: number;

  output(input: Vector): Vector;

  /**
   * Gradient of the loss with respect to `input`, given the gradient with
   * respect to this layer's output. Leaves parameters untouched.
   */
  inputGradient(input: Vector, outputGradient: Vector): Vector;

  /** One in-place gradient descent step on the layer's parameters. */
  update(input: Vector, outputGradient: Vector, learningRate: number): void;

  parameterCount(): number;
}

export abstract class LayerComponent implements Layer {
  abstract readonly kind: string;
  abstract readonly inputWidth: number;
  abstract readonly outputWidth: number;

  abstract output(input: Vector): Vector;

  abstract inputGradient(input: Vector, outputGradient: Vector): Vector;

  update(input: Vector, outputGradient: Vector, _learningRate: number): void {
    this.checkInput("update", input);
    this.checkOutputGradient("update", outputGradient);
  }

  parameterCount(): number {
    return 0;
  }

  protected checkInput(method: string, input: Vector): void {
    checkWidth(`${this.constructor.name}.${method}`, "input width", this.inputWidth, input);
  }

  protected checkOutputGradient(method: string, outputGradient: Vector): void {
    checkWidth(
      `${this.constructor.name}.${method}`,
      "output gradient width",
      this.outputWidth,
      outputGradient
    );
  }
}
