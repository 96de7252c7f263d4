import { Activation, activationTag } from "../activation/activations";
import { ConstructionError, ShapeMismatchError, TrainingError } from "../errors";
import { crossEntropyLoss } from "../loss/loss";
import { accuracy, zeros, zerosLike } from "../math/vector";
import { LossFunction, Matrix, RandomSource, Vector } from "../types";
import { Layer } from "./layer";

export interface NetworkOptions {
  /** Source for weight initialization. Defaults to Math.random. */
  rng?: RandomSource;
  /** Loss used by train/trainBatch/evaluate. Defaults to cross-entropy. */
  loss?: LossFunction;
}

export interface EvaluationResult {
  loss: number;
  accuracy: number;
}

export interface LayerSummary {
  index: number;
  inputSize: number;
  outputSize: number;
  activation: string;
  parameters: number;
}

/**
 * Ordered stack of fully connected layers trained with plain SGD.
 *
 * Data flows forward through the layers for inference and backward for
 * training. An instance owns its layers and is not safe to train from
 * concurrent callers.
 */
export class NeuralNetwork {
  readonly layers: Layer[];
  readonly loss: LossFunction;

  /**
   * @param sizes - Unit counts [s0, ..., sL]; layer i maps sizes[i] -> sizes[i+1]
   * @param activations - One activation per layer (sizes.length - 1 entries)
   */
  constructor(
    sizes: readonly number[],
    activations: readonly Activation[],
    options: NetworkOptions = {},
  ) {
    if (sizes.length < 2) {
      throw new ConstructionError("at least an input and an output size are required");
    }
    if (activations.length !== sizes.length - 1) {
      throw new ConstructionError(
        `Number of activations (${activations.length}) must be one less than number of sizes (${sizes.length})`,
      );
    }
    const bad = sizes.find((s) => !Number.isInteger(s) || s <= 0);
    if (bad !== undefined) {
      throw new ConstructionError(`layer sizes must be positive integers, got ${bad}`);
    }
    const rng = options.rng ?? Math.random;
    this.loss = options.loss ?? crossEntropyLoss;
    this.layers = activations.map(
      (act, i) => new Layer(sizes[i]!, sizes[i + 1]!, act, rng),
    );
  }

  /** Assemble a network from existing layers, checking that their sizes chain. */
  static fromLayers(
    layers: readonly Layer[],
    options: Pick<NetworkOptions, "loss"> = {},
  ): NeuralNetwork {
    if (layers.length === 0) {
      throw new ConstructionError("a network needs at least one layer");
    }
    for (let i = 1; i < layers.length; i++) {
      const prev = layers[i - 1]!;
      const cur = layers[i]!;
      if (prev.outputSize !== cur.inputSize) {
        throw new ConstructionError(
          `layer ${i - 1} outputs ${prev.outputSize} units but layer ${i} expects ${cur.inputSize}`,
        );
      }
    }
    // Build a 1-1 shell, then swap in the provided layers.
    const net = new NeuralNetwork([1, 1], [layers[0]!.activation], {
      ...options,
      rng: () => 0,
    });
    net.layers.splice(0, net.layers.length, ...layers);
    return net;
  }

  get inputSize(): number {
    return this.layers[0]!.inputSize;
  }

  get outputSize(): number {
    return this.layers[this.layers.length - 1]!.outputSize;
  }

  forward(input: readonly number[]): Vector {
    if (input.length !== this.inputSize) {
      throw new ShapeMismatchError("NeuralNetwork.forward", this.inputSize, input.length);
    }
    let out: readonly number[] = input;
    for (const layer of this.layers) out = layer.forward(out);
    return out.slice();
  }

  /** Inference only; mutates nothing but the layers' forward caches. */
  predict(input: readonly number[]): Vector {
    return this.forward(input);
  }

  /**
   * Single-example SGD step. Every layer is updated as soon as its backward
   * pass runs.
   * @returns Loss before the update
   */
  train(input: readonly number[], target: readonly number[], learningRate: number): number {
    const output = this.forward(input);
    const { loss, grad } = this.loss(output, target);
    let errorGrad: Vector = grad;
    for (let l = this.layers.length - 1; l >= 0; l--) {
      errorGrad = this.layers[l]!.backward(errorGrad, learningRate);
    }
    return loss;
  }

  /**
   * Mini-batch SGD step: accumulate per-sample gradients with backward at
   * learning rate 0, then apply one update averaged over the batch.
   * A batch of one yields exactly the parameters `train` would.
   * @returns Mean loss over the batch before the update
   */
  trainBatch(
    inputs: readonly (readonly number[])[],
    targets: readonly (readonly number[])[],
    learningRate: number,
  ): number {
    if (inputs.length !== targets.length) {
      throw new ShapeMismatchError("NeuralNetwork.trainBatch", inputs.length, targets.length);
    }
    const batchSize = inputs.length;
    if (batchSize === 0) throw new TrainingError("trainBatch requires at least one sample");

    const weightGrads: Matrix[] = this.layers.map((layer) => zerosLike(layer.weights));
    const biasGrads: Vector[] = this.layers.map((layer) => zeros(layer.outputSize));

    let lossSum = 0;
    for (let s = 0; s < batchSize; s++) {
      const output = this.forward(inputs[s]!);
      const { loss, grad } = this.loss(output, targets[s]!);
      lossSum += loss;

      let errorGrad: Vector = grad;
      for (let l = this.layers.length - 1; l >= 0; l--) {
        const layer = this.layers[l]!;
        errorGrad = layer.backward(errorGrad, 0);
        const delta = layer.getDelta();
        const input = layer.getInput();
        const gW = weightGrads[l]!;
        const gb = biasGrads[l]!;
        for (let i = 0; i < delta.length; i++) {
          const d = delta[i]!;
          const row = gW[i]!;
          for (let j = 0; j < input.length; j++) row[j]! += d * input[j]!;
          gb[i]! += d;
        }
      }
    }

    this.layers.forEach((layer, l) => {
      layer.applyGradients(weightGrads[l]!, biasGrads[l]!, learningRate, batchSize);
    });
    return lossSum / batchSize;
  }

  /** Mean loss and argMax accuracy over a dataset, without updating parameters. */
  evaluate(
    inputs: readonly (readonly number[])[],
    targets: readonly (readonly number[])[],
  ): EvaluationResult {
    if (inputs.length !== targets.length) {
      throw new ShapeMismatchError("NeuralNetwork.evaluate", inputs.length, targets.length);
    }
    if (inputs.length === 0) return { loss: 0, accuracy: 0 };
    let lossSum = 0;
    const preds = inputs.map((x, i) => {
      const p = this.predict(x);
      lossSum += this.loss(p, targets[i]!).loss;
      return p;
    });
    return { loss: lossSum / inputs.length, accuracy: accuracy(preds, targets) };
  }

  /** Independent copy with identical parameters and fresh activations. */
  clone(): NeuralNetwork {
    return NeuralNetwork.fromLayers(
      this.layers.map((layer) => layer.clone()),
      { loss: this.loss },
    );
  }

  summary(): LayerSummary[] {
    return this.layers.map((layer, index) => ({
      index,
      inputSize: layer.inputSize,
      outputSize: layer.outputSize,
      activation: activationTag(layer.activation),
      parameters: layer.outputSize * layer.inputSize + layer.outputSize,
    }));
  }
}
