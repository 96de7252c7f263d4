import { ShapeMismatchError } from "../errors";
import { LossFunction, LossResult } from "../types";

export const CROSS_ENTROPY_EPSILON = 1e-15;

function assertPaired(
  name: string,
  predicted: readonly number[],
  target: readonly number[],
): void {
  if (predicted.length !== target.length) {
    throw new ShapeMismatchError(name, target.length, predicted.length);
  }
}

/**
 * Categorical cross-entropy against a probability vector.
 *
 * Predictions are clamped into [ε, 1-ε] for the log only. The gradient is the
 * simplified `p - t`, which is dLoss/dz for a softmax output layer; against any
 * other output activation it is not the true gradient.
 */
export const crossEntropyLoss: LossFunction = (predicted, target): LossResult => {
  assertPaired("crossEntropyLoss", predicted, target);
  let loss = 0;
  const grad = new Array<number>(predicted.length);
  for (let i = 0; i < predicted.length; i++) {
    const p = predicted[i]!;
    const t = target[i]!;
    const clamped = Math.min(Math.max(p, CROSS_ENTROPY_EPSILON), 1 - CROSS_ENTROPY_EPSILON);
    loss -= t * Math.log(clamped);
    grad[i] = p - t;
  }
  return { loss, grad };
};

/** Mean squared error; gradient is 2(p - t) per element (not divided by n). */
export const mseLoss: LossFunction = (predicted, target): LossResult => {
  assertPaired("mseLoss", predicted, target);
  let sum = 0;
  const grad = new Array<number>(predicted.length);
  for (let i = 0; i < predicted.length; i++) {
    const diff = predicted[i]! - target[i]!;
    sum += diff * diff;
    grad[i] = 2 * diff;
  }
  return { loss: predicted.length === 0 ? 0 : sum / predicted.length, grad };
};
