/**
 * Activation functions.
 *
 * The set is closed: every activation carries a `kind` tag, and only Softmax
 * exposes `activateVector`. Layers check for that capability once per call
 * instead of inspecting classes.
 *
 * `derivative(y, z)` is always written in terms of the post-activation output
 * `y`, since that is what the layer caches and passes during backward. A new
 * activation must follow the same convention or its gradients will be wrong.
 * `z` (the pre-activation sum) is provided for activations whose derivative
 * cannot be recovered from `y` alone.
 */

import { ConstructionError, UnknownActivationError } from "../errors";
import { Vector } from "../types";

export const ACTIVATION_KINDS = [
  "sigmoid",
  "relu",
  "leaky_relu",
  "tanh",
  "linear",
  "elu",
  "swish",
  "softmax",
] as const;

export type ActivationKind = (typeof ACTIVATION_KINDS)[number];

export interface Activation {
  readonly kind: ActivationKind;
  /** Slope parameter for leaky_relu and elu. */
  readonly alpha?: number;
  activate(x: number): number;
  /** d activate / dz, expressed through the output y = activate(z). */
  derivative(y: number, z: number): number;
  /** Present only for vector-wide activations (softmax). */
  activateVector?(v: readonly number[]): Vector;
}

function logistic(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

// Negative z must map to y <= 0 for the output-based derivatives to hold.
function assertPositiveAlpha(kind: string, alpha: number): void {
  if (!(alpha > 0) || !Number.isFinite(alpha)) {
    throw new ConstructionError(`${kind} alpha must be a positive number, got ${alpha}`);
  }
}

export class Sigmoid implements Activation {
  readonly kind = "sigmoid";
  activate(x: number): number {
    return logistic(x);
  }
  derivative(y: number, _z?: number): number {
    return y * (1 - y);
  }
}

export class ReLU implements Activation {
  readonly kind = "relu";
  activate(x: number): number {
    return x > 0 ? x : 0;
  }
  // Subgradient at 0 is 0.
  derivative(y: number, _z?: number): number {
    return y > 0 ? 1 : 0;
  }
}

export class LeakyReLU implements Activation {
  readonly kind = "leaky_relu";
  constructor(readonly alpha = 0.01) {
    assertPositiveAlpha("leaky_relu", alpha);
  }
  activate(x: number): number {
    return x > 0 ? x : this.alpha * x;
  }
  derivative(y: number, _z?: number): number {
    return y > 0 ? 1 : this.alpha;
  }
}

export class Tanh implements Activation {
  readonly kind = "tanh";
  activate(x: number): number {
    return Math.tanh(x);
  }
  derivative(y: number, _z?: number): number {
    return 1 - y * y;
  }
}

export class Linear implements Activation {
  readonly kind = "linear";
  activate(x: number): number {
    return x;
  }
  derivative(_y?: number, _z?: number): number {
    return 1;
  }
}

export class ELU implements Activation {
  readonly kind = "elu";
  constructor(readonly alpha = 1.0) {
    assertPositiveAlpha("elu", alpha);
  }
  activate(x: number): number {
    return x > 0 ? x : this.alpha * Math.expm1(x);
  }
  // For x <= 0, y = α(eˣ - 1) so α·eˣ = y + α.
  derivative(y: number, _z?: number): number {
    return y > 0 ? 1 : y + this.alpha;
  }
}

/** x·σ(x). Scalar only. */
export class Swish implements Activation {
  readonly kind = "swish";
  activate(x: number): number {
    return x * logistic(x);
  }
  // σ(z) + y(1 - σ(z)); needs z because swish is not invertible.
  derivative(y: number, z: number): number {
    const s = logistic(z);
    return s + y * (1 - s);
  }
}

/**
 * Vector-wide softmax. The scalar pair is an identity no-op and is never
 * applied elementwise: paired with cross-entropy, the layer passes the loss
 * gradient straight through as its delta.
 */
export class Softmax implements Activation {
  readonly kind = "softmax";

  activate(x: number): number {
    return x;
  }
  derivative(_y?: number, _z?: number): number {
    return 1;
  }

  activateVector(v: readonly number[]): Vector {
    let max = -Infinity;
    for (const x of v) if (x > max) max = x;
    let sum = 0;
    const out = v.map((x) => {
      const e = Math.exp(x - max);
      sum += e;
      return e;
    });
    for (let i = 0; i < out.length; i++) out[i] = out[i]! / sum;
    return out;
  }
}

export function isActivationKind(tag: string): tag is ActivationKind {
  return ACTIVATION_KINDS.some((kind) => kind === tag);
}

/**
 * Resolve a persisted tag into a fresh activation. Tags are matched
 * case-insensitively; anything unrecognized throws `UnknownActivationError`.
 */
export function activationFromTag(tag: string, alpha?: number): Activation {
  const key = tag.toLowerCase();
  if (!isActivationKind(key)) throw new UnknownActivationError(tag);
  switch (key) {
    case "sigmoid":
      return new Sigmoid();
    case "relu":
      return new ReLU();
    case "leaky_relu":
      return new LeakyReLU(alpha);
    case "tanh":
      return new Tanh();
    case "linear":
      return new Linear();
    case "elu":
      return new ELU(alpha);
    case "swish":
      return new Swish();
    case "softmax":
      return new Softmax();
  }
}

export function activationTag(activation: Activation): ActivationKind {
  return activation.kind;
}

/** Whether the activation replaces elementwise application with a vector map. */
export function isVectorWide(activation: Activation): boolean {
  return activation.activateVector !== undefined;
}
