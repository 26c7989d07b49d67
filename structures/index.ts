import { type Layer, LayerComponent } from "./Layer";
import { Dense } from "./Dense";
import { Activation, Hyperbolic, Sigmoid, Rectified } from "./Activation";
import { type LossFunction, SquaredError, HalfSquaredError } from "./Loss";
import { Network } from "./Network";
import { SGDTrainer, type TrainerOptions } from "./Trainer";
import { Graph } from "./Graph";
import { ShapeMismatchError, InvalidConfigurationError } from "./errors";
import { type Rng, type Vector, createRng } from "../nn";

export type { Layer, LossFunction, TrainerOptions, Rng, Vector };
export {
  LayerComponent,
  Dense,
  Activation,
  Hyperbolic,
  Sigmoid,
  Rectified,
  SquaredError,
  HalfSquaredError,
  Network,
  SGDTrainer,
  Graph,
  ShapeMismatchError,
  InvalidConfigurationError,
  createRng
}
