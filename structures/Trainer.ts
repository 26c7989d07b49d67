import { Network } from "./Network";
import { HalfSquaredError, type LossFunction } from "./Loss";
import { InvalidConfigurationError, ShapeMismatchError } from "./errors";
import { type Vector, checkWidth } from "../nn";

export interface TrainerOptions {
  /** defaults to HalfSquaredError, so the output gradient is output - target */
  loss?: LossFunction;
  /** log the iteration loss every n iterations, 0 to stay quiet */
  logEvery?: number;
}

/**
 * Stochastic gradient descent, one training pair at a time.
 * Runs exactly `iterations` passes over the training set, no early stopping.
 */
export class SGDTrainer {
  readonly iterations: number;
  readonly learningRate: number;
  readonly loss: LossFunction;
  readonly logEvery: number;

  constructor(iterations: number, learningRate: number, options: TrainerOptions = {}) {
    if (!Number.isInteger(iterations) || iterations < 0) {
      throw new InvalidConfigurationError(
        `SGDTrainer iterations must be a non-negative integer, got ${iterations}`
      );
    }
    if (!Number.isFinite(learningRate) || learningRate <= 0) {
      throw new InvalidConfigurationError(
        `SGDTrainer learning rate must be positive and finite, got ${learningRate}`
      );
    }
    const logEvery = options.logEvery ?? 0;
    if (!Number.isInteger(logEvery) || logEvery < 0) {
      throw new InvalidConfigurationError(
        `SGDTrainer logEvery must be a non-negative integer, got ${logEvery}`
      );
    }
    this.iterations = iterations;
    this.learningRate = learningRate;
    this.loss = options.loss ?? new HalfSquaredError();
    this.logEvery = logEvery;
  }

  /**
   * Trains `network` in place and returns the summed loss of every iteration,
   * measured on that iteration's forward outputs.
   */
  train(network: Network, inputs: Vector[], targets: Vector[]): number[] {
    this.checkTrainingSet("train", network, inputs, targets);

    const history: number[] = [];
    for (let i = 0; i < this.iterations; i++) {
      let total = 0;
      for (let n = 0; n < inputs.length; n++) {
        const output = network.forward(inputs[n]);
        total += this.loss.loss(output, targets[n]);
        network.backward(this.loss.deriv(output, targets[n]), this.learningRate);
      }
      history.push(total);

      const iteration = i + 1;
      if (this.logEvery > 0 && (iteration % this.logEvery === 0 || iteration === this.iterations)) {
        console.log(`[train] iteration=${iteration} loss=${total}`);
      }
    }
    return history;
  }

  /** Summed loss over the set, without touching any parameter. */
  evaluate(network: Network, inputs: Vector[], targets: Vector[]): number {
    this.checkTrainingSet("evaluate", network, inputs, targets);
    let total = 0;
    for (let n = 0; n < inputs.length; n++) {
      total += this.loss.loss(network.output(inputs[n]), targets[n]);
    }
    return total;
  }

  // runs before the first update
  private checkTrainingSet(
    method: string,
    network: Network,
    inputs: Vector[],
    targets: Vector[]
  ): void {
    const label = `SGDTrainer.${method}`;
    if (inputs.length !== targets.length) {
      throw new ShapeMismatchError(
        `${label} expects target count=${inputs.length}, got ${targets.length}`
      );
    }
    inputs.forEach((x) => checkWidth(label, "input width", network.inputWidth, x));
    targets.forEach((t) => checkWidth(label, "target width", network.outputWidth, t));
  }
}
