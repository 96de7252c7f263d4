import { z } from "zod";
import { ShapeMismatchError, TrainingError } from "../errors";
import { shuffledIndices } from "../math/random";
import { NeuralNetwork } from "../nn/network";
import { EpochMetrics, TrainingObserver } from "../observers/types";
import { RandomSource } from "../types";

const fitOptionsSchema = z.object({
  epochs: z.number().int().positive().default(100),
  batchSize: z.number().int().positive().default(32),
  learningRate: z.number().positive().default(0.1),
  shuffle: z.boolean().default(true),
  earlyStoppingPatience: z.number().int().positive().optional(), // default: disabled
  earlyStoppingMinDelta: z.number().nonnegative().default(0),
});

export type FitOptions = z.input<typeof fitOptionsSchema>;
export type ResolvedFitOptions = z.output<typeof fitOptionsSchema>;

export interface FitResult {
  history: EpochMetrics[];
  stoppedEarly: boolean;
}

/** Parses and validates fit options, filling defaults. */
export function parseFitOptions(input: unknown): ResolvedFitOptions {
  const result = fitOptionsSchema.safeParse(input ?? {});
  if (!result.success) {
    const msgs = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new TrainingError(`Invalid training options: ${msgs.join("; ")}`);
  }
  return result.data;
}

/**
 * Epoch loop around `NeuralNetwork.trainBatch`.
 *
 * Features:
 * - Mini-batches over an optionally shuffled sample order
 * - Full-dataset evaluation after every epoch
 * - Early stopping on evaluated loss
 * - Observer callbacks for logging and metrics
 */
export class Trainer {
  private observers: TrainingObserver[] = [];

  constructor(
    private network: NeuralNetwork,
    private rng: RandomSource = Math.random,
  ) {}

  /** Register a training observer for epoch-level callbacks. */
  addObserver(observer: TrainingObserver): void {
    this.observers.push(observer);
  }

  fit(
    inputs: readonly (readonly number[])[],
    targets: readonly (readonly number[])[],
    options: FitOptions = {},
  ): FitResult {
    const opts = parseFitOptions(options);
    if (inputs.length !== targets.length) {
      throw new ShapeMismatchError("Trainer.fit", inputs.length, targets.length);
    }
    if (inputs.length === 0) throw new TrainingError("cannot fit on an empty dataset");

    const history: EpochMetrics[] = [];
    let bestLoss = Infinity;
    let noImprovement = 0;
    let stoppedEarly = false;

    for (let epoch = 1; epoch <= opts.epochs; epoch++) {
      const order = opts.shuffle
        ? shuffledIndices(inputs.length, this.rng)
        : inputs.map((_, i) => i);

      let lossSum = 0;
      let batches = 0;
      for (let start = 0; start < order.length; start += opts.batchSize) {
        const idx = order.slice(start, start + opts.batchSize);
        lossSum += this.network.trainBatch(
          idx.map((i) => inputs[i]!),
          idx.map((i) => targets[i]!),
          opts.learningRate,
        );
        batches++;
      }

      const { loss, accuracy } = this.network.evaluate(inputs, targets);
      const metrics: EpochMetrics = {
        epoch,
        trainLoss: lossSum / batches,
        loss,
        accuracy,
        batches,
      };
      history.push(metrics);
      for (const observer of this.observers) observer.onEpochComplete(metrics);

      if (loss < bestLoss - opts.earlyStoppingMinDelta) {
        bestLoss = loss;
        noImprovement = 0;
      } else {
        noImprovement++;
      }
      if (
        opts.earlyStoppingPatience !== undefined &&
        noImprovement >= opts.earlyStoppingPatience
      ) {
        stoppedEarly = true;
        break;
      }
    }

    for (const observer of this.observers) observer.onTrainingEnd?.(history, stoppedEarly);
    return { history, stoppedEarly };
  }
}
