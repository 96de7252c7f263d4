import { outer } from "../math/vector";
import { NeuralNetwork } from "./network";

export interface GradientCheckEntry {
  layer: number;
  kind: "weight" | "bias";
  row: number;
  /** Column index for weights, -1 for biases. */
  col: number;
  numeric: number;
  analytic: number;
  diff: number;
}

export interface GradientCheckReport {
  entries: GradientCheckEntry[];
  maxAbsDiff: number;
  /** max |numeric - analytic| / max(|numeric| + |analytic|, 1e-12) */
  maxRelDiff: number;
}

/**
 * Compare backprop gradients with central finite differences of the
 * network's loss on one sample. Parameters are restored after probing.
 *
 * The comparison is only meaningful when the loss gradient is the exact
 * derivative of the loss value, e.g. cross-entropy on a softmax output.
 */
export function gradientCheck(
  network: NeuralNetwork,
  input: readonly number[],
  target: readonly number[],
  epsilon = 1e-5,
): GradientCheckReport {
  // Analytic pass: backward at learning rate 0 leaves parameters untouched.
  const output = network.forward(input);
  let errorGrad = network.loss(output, target).grad;
  const analyticW: number[][][] = [];
  const analyticB: number[][] = [];
  for (let l = network.layers.length - 1; l >= 0; l--) {
    const layer = network.layers[l]!;
    errorGrad = layer.backward(errorGrad, 0);
    analyticW[l] = outer(layer.getDelta(), layer.getInput());
    analyticB[l] = layer.getDelta().slice();
  }

  const lossAt = (): number => network.loss(network.predict(input), target).loss;
  const probe = (values: number[], idx: number): number => {
    const original = values[idx]!;
    values[idx] = original + epsilon;
    const plus = lossAt();
    values[idx] = original - epsilon;
    const minus = lossAt();
    values[idx] = original;
    return (plus - minus) / (2 * epsilon);
  };

  const entries: GradientCheckEntry[] = [];
  const record = (
    layer: number,
    kind: GradientCheckEntry["kind"],
    row: number,
    col: number,
    numeric: number,
    analytic: number,
  ): void => {
    entries.push({ layer, kind, row, col, numeric, analytic, diff: Math.abs(numeric - analytic) });
  };

  network.layers.forEach((layer, l) => {
    layer.weights.forEach((row, i) => {
      for (let j = 0; j < row.length; j++) {
        record(l, "weight", i, j, probe(row, j), analyticW[l]![i]![j]!);
      }
    });
    for (let i = 0; i < layer.biases.length; i++) {
      record(l, "bias", i, -1, probe(layer.biases, i), analyticB[l]![i]!);
    }
  });

  let maxAbsDiff = 0;
  let maxRelDiff = 0;
  for (const e of entries) {
    maxAbsDiff = Math.max(maxAbsDiff, e.diff);
    const denom = Math.max(Math.abs(e.numeric) + Math.abs(e.analytic), 1e-12);
    maxRelDiff = Math.max(maxRelDiff, e.diff / denom);
  }
  return { entries, maxAbsDiff, maxRelDiff };
}
