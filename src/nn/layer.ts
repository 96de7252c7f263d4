import { Activation, activationFromTag } from "../activation/activations";
import { ConstructionError, ShapeMismatchError, TrainingError } from "../errors";
import { cloneMatrix, hadamard } from "../math/vector";
import { uniform } from "../math/random";
import { Matrix, RandomSource, Vector } from "../types";

/** Values captured by `forward` and consumed by the following `backward`. */
export interface LayerCache {
  input: Vector;
  preActivation: Vector;
  output: Vector;
}

export const INIT_WEIGHT_RANGE = 0.1;

/**
 * Fully connected layer: output = activation(W·input + b).
 *
 * W has shape [outputSize][inputSize]. The forward cache is single-owner
 * scratch state: one `backward` reads what the last `forward` stored.
 */
export class Layer {
  weights: Matrix;
  biases: Vector;
  readonly activation: Activation;

  private cache: LayerCache | undefined;
  private delta: Vector = [];

  constructor(
    inputSize: number,
    outputSize: number,
    activation: Activation,
    rng: RandomSource = Math.random,
  ) {
    this.weights = Array.from({ length: outputSize }, () =>
      Array.from({ length: inputSize }, () =>
        uniform(rng, -INIT_WEIGHT_RANGE, INIT_WEIGHT_RANGE),
      ),
    );
    this.biases = new Array<number>(outputSize).fill(0);
    this.activation = activation;
  }

  /** Rebuild a layer from stored parameters; the arrays are copied. */
  static fromParameters(
    weights: readonly (readonly number[])[],
    biases: readonly number[],
    activation: Activation,
  ): Layer {
    if (weights.length === 0) {
      throw new ConstructionError("layer must have at least one output unit");
    }
    if (weights.length !== biases.length) {
      throw new ConstructionError(
        `weights have ${weights.length} rows but biases have ${biases.length} entries`,
      );
    }
    const cols = weights[0]!.length;
    if (cols === 0 || weights.some((row) => row.length !== cols)) {
      throw new ConstructionError("weight rows must be non-empty and of equal length");
    }
    const layer = new Layer(0, 0, activation);
    layer.weights = cloneMatrix(weights);
    layer.biases = biases.slice();
    return layer;
  }

  get inputSize(): number {
    return this.weights[0]?.length ?? 0;
  }

  get outputSize(): number {
    return this.weights.length;
  }

  forward(input: readonly number[]): Vector {
    if (input.length !== this.inputSize) {
      throw new ShapeMismatchError("Layer.forward", this.inputSize, input.length);
    }
    const z = new Array<number>(this.outputSize);
    for (let i = 0; i < this.outputSize; i++) {
      let s = this.biases[i]!;
      const Wi = this.weights[i]!;
      for (let j = 0; j < Wi.length; j++) s += Wi[j]! * input[j]!;
      z[i] = s;
    }

    let output: Vector;
    if (this.activation.activateVector) {
      output = this.activation.activateVector(z);
    } else {
      output = z.map((v) => this.activation.activate(v));
    }

    this.cache = { input: input.slice(), preActivation: z, output };
    return output.slice();
  }

  /**
   * Propagate dLoss/dOutput back through the layer.
   *
   * Returns dLoss/dInput computed with the pre-update weights. Parameters are
   * updated only when `learningRate > 0`; 0 computes gradients without mutating,
   * which is what batch accumulation relies on.
   */
  backward(errorGrad: readonly number[], learningRate: number): Vector {
    const cache = this.cache;
    if (!cache) throw new TrainingError("Layer.backward called before forward");
    if (errorGrad.length !== this.outputSize) {
      throw new ShapeMismatchError("Layer.backward", this.outputSize, errorGrad.length);
    }

    const { input, preActivation, output } = cache;
    // Softmax + cross-entropy: the loss gradient already is dLoss/dz.
    const delta = this.activation.activateVector
      ? errorGrad.slice()
      : hadamard(
          errorGrad,
          output.map((y, i) => this.activation.derivative(y, preActivation[i]!)),
        );
    this.delta = delta;

    const prevError = new Array<number>(input.length).fill(0);
    for (let i = 0; i < delta.length; i++) {
      const d = delta[i]!;
      const Wi = this.weights[i]!;
      for (let j = 0; j < input.length; j++) prevError[j]! += d * Wi[j]!;
    }

    if (learningRate > 0) {
      for (let i = 0; i < delta.length; i++) {
        const d = delta[i]!;
        const Wi = this.weights[i]!;
        for (let j = 0; j < Wi.length; j++) Wi[j]! -= learningRate * (d * input[j]!);
        this.biases[i]! -= learningRate * d;
      }
    }

    return prevError;
  }

  /**
   * Apply accumulated gradients averaged over `batchSize`:
   * W -= lr · g / batchSize.
   */
  applyGradients(
    weightGrad: readonly (readonly number[])[],
    biasGrad: readonly number[],
    learningRate: number,
    batchSize: number,
  ): void {
    if (weightGrad.length !== this.outputSize) {
      throw new ShapeMismatchError("Layer.applyGradients", this.outputSize, weightGrad.length);
    }
    if (biasGrad.length !== this.outputSize) {
      throw new ShapeMismatchError("Layer.applyGradients", this.outputSize, biasGrad.length);
    }
    for (let i = 0; i < this.outputSize; i++) {
      const Wi = this.weights[i]!;
      const Gi = weightGrad[i]!;
      for (let j = 0; j < Wi.length; j++) Wi[j]! -= (learningRate * Gi[j]!) / batchSize;
      this.biases[i]! -= (learningRate * biasGrad[i]!) / batchSize;
    }
  }

  /** Delta from the last backward call (dLoss/dz). */
  getDelta(): readonly number[] {
    return this.delta;
  }

  /** Input seen by the last forward call. */
  getInput(): readonly number[] {
    return this.cache?.input ?? [];
  }

  /** Deep copy of parameters with a fresh activation of the same kind. */
  clone(): Layer {
    return Layer.fromParameters(
      this.weights,
      this.biases,
      activationFromTag(this.activation.kind, this.activation.alpha),
    );
  }
}
