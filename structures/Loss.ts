import { ShapeMismatchError } from "./errors";
import { type Vector, sum, zip } from "../nn";

export interface LossFunction {
  /** loss for a single prediction against its target */
  loss1(prediction: number, target: number): number;
  /** d loss1 / d prediction */
  deriv1(prediction: number, target: number): number;
  loss(predictions: Vector, targets: Vector): number;
  deriv(predictions: Vector, targets: Vector): Vector;
}

abstract class ElementwiseLoss implements LossFunction {
  abstract loss1(prediction: number, target: number): number;
  abstract deriv1(prediction: number, target: number): number;

  loss(predictions: Vector, targets: Vector): number {
    return sum(this.pairs("loss", predictions, targets).map(([y, t]) => this.loss1(y, t)));
  }

  deriv(predictions: Vector, targets: Vector): Vector {
    return this.pairs("deriv", predictions, targets).map(([y, t]) => this.deriv1(y, t));
  }

  private pairs(method: string, predictions: Vector, targets: Vector): [number, number][] {
    if (predictions.length !== targets.length) {
      throw new ShapeMismatchError(
        `${this.constructor.name}.${method} expects target width=${predictions.length}, got ${targets.length}`
      );
    }
    return zip(predictions, targets);
  }
}

// e = (y - t)^2, de/dy = 2 (y - t)
export class SquaredError extends ElementwiseLoss {
  loss1(prediction: number, target: number): number {
    return (prediction - target) * (prediction - target);
  }

  deriv1(prediction: number, target: number): number {
    return 2 * (prediction - target);
  }
}

// e = (y - t)^2 / 2, de/dy = y - t
export class HalfSquaredError extends ElementwiseLoss {
  loss1(prediction: number, target: number): number {
    return 0.5 * (prediction - target) * (prediction - target);
  }

  deriv1(prediction: number, target: number): number {
    return prediction - target;
  }
}
