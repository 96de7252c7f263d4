/**
 * Persisted model conversion and JSON file save/load.
 *
 * A model is an ordered list of { weights, biases, activation } records.
 * Nothing ephemeral (forward caches, deltas) is stored. Loading resolves each
 * activation tag into a fresh instance and fails on any tag it does not know.
 */

import { promises as fs } from "fs";
import { activationFromTag } from "../activation/activations";
import { ConstructionError, ModelFormatError } from "../errors";
import { cloneMatrix, hasNonFinite } from "../math/vector";
import { Layer } from "../nn/layer";
import { NetworkOptions, NeuralNetwork } from "../nn/network";
import { LayerRecord, PersistedModel, parsePersistedModel } from "./modelShape";

/**
 * Snapshot the network's parameters. JSON has no NaN or Infinity, so a
 * network holding either is rejected here instead of being written as null.
 */
export function toModel(network: NeuralNetwork): PersistedModel {
  return {
    layers: network.layers.map((layer, index): LayerRecord => {
      if (hasNonFinite(layer.weights) || hasNonFinite(layer.biases)) {
        throw new ModelFormatError(`layer ${index} has non-finite parameters`);
      }
      const { kind, alpha } = layer.activation;
      return {
        weights: cloneMatrix(layer.weights),
        biases: layer.biases.slice(),
        activation: kind,
        ...(alpha !== undefined ? { alpha } : {}),
      };
    }),
  };
}

export function fromModel(
  model: unknown,
  options: Pick<NetworkOptions, "loss"> = {},
): NeuralNetwork {
  const parsed = parsePersistedModel(model);
  const layers = parsed.layers.map((rec) =>
    Layer.fromParameters(rec.weights, rec.biases, activationFromTag(rec.activation, rec.alpha)),
  );
  try {
    return NeuralNetwork.fromLayers(layers, options);
  } catch (err) {
    if (err instanceof ConstructionError) throw new ModelFormatError(err.message);
    throw err;
  }
}

export function serializeNetwork(network: NeuralNetwork): string {
  return JSON.stringify(toModel(network), null, 2);
}

export function deserializeNetwork(
  json: string,
  options: Pick<NetworkOptions, "loss"> = {},
): NeuralNetwork {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ModelFormatError(`model is not valid JSON: ${reason}`);
  }
  return fromModel(data, options);
}

export async function saveNetwork(network: NeuralNetwork, path: string): Promise<void> {
  await fs.writeFile(path, serializeNetwork(network));
}

export async function loadNetwork(
  path: string,
  options: Pick<NetworkOptions, "loss"> = {},
): Promise<NeuralNetwork> {
  const txt = await fs.readFile(path, "utf8");
  return deserializeNetwork(txt, options);
}
