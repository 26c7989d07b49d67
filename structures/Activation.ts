import { LayerComponent } from "./Layer";
import { InvalidConfigurationError } from "./errors";
import { type Vector, isPositiveInteger } from "../nn";

/**
 * Elementwise nonlinearity with no parameters. Subclasses supply the function
 * and its derivative; update stays the inherited no-op.
 */
export abstract class Activation extends LayerComponent {
  readonly size: number;
  readonly inputWidth: number;
  readonly outputWidth: number;

  constructor(size: number) {
    super();
    if (!isPositiveInteger(size)) {
      throw new InvalidConfigurationError(
        `${this.constructor.name} size must be a positive integer, got ${size}`
      );
    }
    this.size = size;
    this.inputWidth = size;
    this.outputWidth = size;
  }

  protected abstract activate(x: number): number;

  /** dy/dx at input x, where y = activate(x) */
  protected abstract derivative(x: number, y: number): number;

  output(input: Vector): Vector {
    this.checkInput("output", input);
    return input.map((x) => this.activate(x));
  }

  inputGradient(input: Vector, outputGradient: Vector): Vector {
    this.checkInput("inputGradient", input);
    this.checkOutputGradient("inputGradient", outputGradient);
    return input.map((x, k) => outputGradient[k] * this.derivative(x, this.activate(x)));
  }
}

export class Hyperbolic extends Activation {
  readonly kind = "tanh";

  protected activate(x: number): number {
    return Math.tanh(x);
  }

  // y = tanh(x), dy/dx = 1 - y^2
  protected derivative(_x: number, y: number): number {
    return 1 - y * y;
  }
}

export class Sigmoid extends Activation {
  readonly kind = "sigmoid";

  protected activate(x: number): number {
    return 1 / (1 + Math.exp(-x));
  }

  // dy/dx = y (1 - y)
  protected derivative(_x: number, y: number): number {
    return y * (1 - y);
  }
}

export class Rectified extends Activation {
  readonly kind = "relu";

  protected activate(x: number): number {
    return Math.max(0, x);
  }

  protected derivative(x: number): number {
    return x > 0 ? 1 : 0;
  }
}
