/**
 * A vector length does not match a layer width, or two adjacent layers
 * disagree on the width between them.
 */
export class ShapeMismatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ShapeMismatchError";
  }
}

/**
 * Rejected construction arguments: trainer settings, layer sizes,
 * empty or shared-layer networks.
 */
export class InvalidConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidConfigurationError";
  }
}
