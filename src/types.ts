/**
 * Core numeric types shared across activations, layers, losses and persistence.
 */

/** Dense vector of activations, gradients or biases. */
export type Vector = number[];

/** Row-major matrix; weights are stored as [outputSize][inputSize]. */
export type Matrix = number[][];

/** Uniform random source in [0, 1). `Math.random` satisfies it. */
export type RandomSource = () => number;

/** Loss value paired with dLoss/dOutput. */
export interface LossResult {
  loss: number;
  grad: Vector;
}

/** Loss function consumed by training: (predicted, target) -> (loss, grad). */
export type LossFunction = (
  predicted: readonly number[],
  target: readonly number[],
) => LossResult;
