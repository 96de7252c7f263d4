/**
 * Error taxonomy. Failures here are structural (bad shapes, bad config,
 * bad persisted data), never transient, so nothing is retried.
 */

export class NetworkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Layer/activation count mismatch or invalid layer sizes. */
export class ConstructionError extends NetworkError {}

/** Vector or matrix length mismatch at a call site. */
export class ShapeMismatchError extends NetworkError {
  constructor(
    readonly context: string,
    readonly expected: number,
    readonly actual: number,
  ) {
    super(`${context}: expected length ${expected}, got ${actual}`);
  }
}

/** Mean/normalize on an empty vector. */
export class EmptyVectorError extends NetworkError {
  constructor(readonly operation: string) {
    super(`${operation}: vector must not be empty`);
  }
}

/** Activation tag that does not name a known activation. */
export class UnknownActivationError extends NetworkError {
  constructor(readonly tag: string) {
    super(`unknown activation: ${tag}`);
  }
}

/** Persisted model that does not match the expected format. */
export class ModelFormatError extends NetworkError {}

/** Training call that cannot proceed (empty batch, backward before forward). */
export class TrainingError extends NetworkError {}

/** Invalid CLI or environment configuration. */
export class ConfigError extends NetworkError {}
