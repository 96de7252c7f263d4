/**
 * Export a trained network to a TensorFlow.js LayersModel.
 *
 * The exported model reproduces `NeuralNetwork.predict` within float32
 * tolerance and can be saved or served with the regular TF.js tooling.
 * TensorFlow.js is loaded lazily so the core library does not pay for it.
 */

import type * as tfTypes from "@tensorflow/tfjs";
import { Activation } from "../activation/activations";
import { NeuralNetwork } from "../nn/network";

type Tf = typeof tfTypes;

function loadTf(): Tf {
  return require("@tensorflow/tfjs") as Tf;
}

type TfLayer = Parameters<tfTypes.Sequential["add"]>[0];

type DenseActivation = "sigmoid" | "relu" | "tanh" | "linear" | "softmax" | "swish" | "elu";

/**
 * ELU with a non-default alpha. `tf.layers.elu` only accepts alpha = 1, so
 * the scaled form is computed directly.
 */
function scaledEluLayer(tf: Tf, alpha: number): TfLayer {
  class ScaledELU extends tf.layers.Layer {
    static className = "ScaledELU";

    constructor(private readonly alpha: number) {
      super({});
    }

    override call(inputs: tfTypes.Tensor | tfTypes.Tensor[]): tfTypes.Tensor {
      const x = Array.isArray(inputs) ? inputs[0] : inputs;
      if (!x) throw new Error("ScaledELU expects one input tensor");
      return tf.tidy(() => tf.where(tf.greater(x, 0), x, tf.mul(tf.expm1(x), this.alpha)));
    }

    override getConfig(): tfTypes.serialization.ConfigDict {
      return { ...super.getConfig(), alpha: this.alpha };
    }
  }
  return new ScaledELU(alpha);
}

/** Dense activation plus an optional follow-up layer for parametrized kinds. */
function denseActivationFor(
  tf: Tf,
  activation: Activation,
): { dense: DenseActivation; extra?: TfLayer } {
  switch (activation.kind) {
    case "leaky_relu":
      return { dense: "linear", extra: tf.layers.leakyReLU({ alpha: activation.alpha ?? 0.01 }) };
    case "elu": {
      const alpha = activation.alpha ?? 1.0;
      return alpha === 1 ? { dense: "elu" } : { dense: "linear", extra: scaledEluLayer(tf, alpha) };
    }
    default:
      return { dense: activation.kind };
  }
}

/** Transpose [outputSize][inputSize] weights into a TF.js kernel [inputSize, units]. */
function toKernel(weights: readonly (readonly number[])[]): number[][] {
  const rows = weights.length;
  const cols = weights[0]?.length ?? 0;
  return Array.from({ length: cols }, (_, j) =>
    Array.from({ length: rows }, (_, i) => weights[i]![j]!),
  );
}

export function toTfModel(network: NeuralNetwork): tfTypes.Sequential {
  const tf = loadTf();
  const model = tf.sequential();
  network.layers.forEach((layer, index) => {
    const { dense, extra } = denseActivationFor(tf, layer.activation);
    const denseLayer = tf.layers.dense({
      units: layer.outputSize,
      activation: dense,
      useBias: true,
      ...(index === 0 ? { inputShape: [layer.inputSize] } : {}),
    });
    model.add(denseLayer);
    const kernel = tf.tensor2d(toKernel(layer.weights), [layer.inputSize, layer.outputSize]);
    const bias = tf.tensor1d(layer.biases);
    denseLayer.setWeights([kernel, bias]);
    kernel.dispose();
    bias.dispose();
    if (extra) model.add(extra);
  });
  return model;
}

/** Run a batch through a TF.js model and return plain arrays. */
export function predictWithTf(
  model: tfTypes.LayersModel,
  inputs: readonly (readonly number[])[],
): number[][] {
  const tf = loadTf();
  const width = model.inputs[0]?.shape[1] ?? 0;
  return tf.tidy(() => {
    const xs = tf.tensor2d(inputs.map((row) => row.slice()), [inputs.length, width]);
    const out = model.predict(xs);
    if (Array.isArray(out)) throw new Error("expected a single-output model");
    return out.as2D(inputs.length, -1).arraySync();
  });
}
