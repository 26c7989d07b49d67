import { InvalidConfigurationError, ShapeMismatchError } from "./structures/errors";

export type Vector = number[];

// uniform in [0, 1), same contract as Math.random
export type Rng = () => number;

/**
 * Deterministic 32-bit linear congruential generator.
 * state = (a * state + c) mod 2^32, scaled into [0, 1)
 *
 * The seed must be an integer; it is taken mod 2^32, so 1 and 2^32 + 1
 * start the same sequence.
 */
export const createRng = (seed: number): Rng => {
  if (!Number.isSafeInteger(seed)) {
    throw new InvalidConfigurationError(`createRng seed must be an integer, got ${seed}`);
  }
  let state = seed | 0;
  return () => {
    state = (Math.imul(1664525, state) + 1013904223) | 0;
    return (state >>> 0) / 4294967296;
  };
};

export const randFloat = (
  low: number,
  high: number,
  rng: Rng = Math.random
): number => rng() * (high - low) + low;

export const sum = (arr: number[], start?: number): number =>
  arr.reduce((acc, cur) => (acc += cur), start ?? 0);

export const zip = <A, B>(a: A[], b: B[]): [A, B][] => {
  let result: [A, B][] = [];
  const maxCompatLength = Math.min(a.length, b.length);
  for (let i = 0; i < maxCompatLength; i++) {
    result.push([a[i], b[i]]);
  }

  return result;
};

export const dot = (a: Vector, b: Vector): number => {
  if (a.length !== b.length) {
    throw new ShapeMismatchError(
      `dot expects matching lengths, got ${a.length} and ${b.length}`
    );
  }
  let result = 0;
  for (let i = 0; i < a.length; i++) {
    result += a[i] * b[i];
  }
  return result;
};

/**
 * Throws a ShapeMismatchError unless `vec` has exactly `expected` entries.
 * `label` names the caller in the message, e.g. "Dense.output".
 */
export const checkWidth = (
  label: string,
  name: string,
  expected: number,
  vec: Vector
): void => {
  if (vec.length !== expected) {
    throw new ShapeMismatchError(
      `${label} expects ${name}=${expected}, got ${vec.length}`
    );
  }
};

export const isPositiveInteger = (n: number): boolean =>
  Number.isInteger(n) && n > 0;
