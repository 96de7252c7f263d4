#!/usr/bin/env node
/**
 * @fileoverview XOR demo: trains a 2-H-2 network (ReLU hidden layer, softmax
 * output) with mini-batch SGD, reports accuracy and saves the model as JSON.
 */

import { ReLU, Softmax } from "./activation/activations";
import { parseConfig, RunConfig } from "./config";
import { createRng } from "./math/random";
import { NeuralNetwork } from "./nn/network";
import { ConsoleLogger } from "./observers/consoleLogger";
import { MetricsCollector } from "./observers/metricsCollector";
import { saveNetwork } from "./persistence/serialize";
import { Trainer } from "./training/trainer";

export const XOR_INPUTS: number[][] = [
  [0, 0],
  [0, 1],
  [1, 0],
  [1, 1],
];

export const XOR_TARGETS: number[][] = [
  [1, 0],
  [0, 1],
  [0, 1],
  [1, 0],
];

function printBanner(config: RunConfig): void {
  console.log("=".repeat(60));
  console.log("XOR FEED-FORWARD DEMO");
  console.log(
    `epochs=${config.epochs} lr=${config.learningRate} batchSize=${config.batchSize} hidden=${config.hidden} seed=${config.seed ?? "random"}`,
  );
  console.log("=".repeat(60));
}

/**
 * Train on XOR, print per-epoch progress and a summary, and persist the model.
 * @returns The trained network
 */
async function main(config: RunConfig = parseConfig()): Promise<NeuralNetwork> {
  printBanner(config);

  const rng = config.seed !== undefined ? createRng(config.seed) : Math.random;
  const network = new NeuralNetwork(
    [2, config.hidden, 2],
    [new ReLU(), new Softmax()],
    { rng },
  );
  for (const l of network.summary()) {
    console.log(`Layer ${l.index}: ${l.inputSize} -> ${l.outputSize} (${l.activation}, ${l.parameters} params)`);
  }

  const trainer = new Trainer(network, rng);
  const metrics = new MetricsCollector();
  trainer.addObserver(new ConsoleLogger(config.logEvery, config.epochs));
  trainer.addObserver(metrics);

  trainer.fit(XOR_INPUTS, XOR_TARGETS, {
    epochs: config.epochs,
    batchSize: config.batchSize,
    learningRate: config.learningRate,
    shuffle: config.batchSize < XOR_INPUTS.length,
  });
  metrics.printSummary();

  for (const input of XOR_INPUTS) {
    const out = network.predict(input);
    console.log(`${JSON.stringify(input)} -> [${out.map((p) => p.toFixed(3)).join(", ")}]`);
  }

  await saveNetwork(network, config.modelPath);
  console.log(`\nModel saved to ${config.modelPath}`);
  return network;
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}

export { main };
