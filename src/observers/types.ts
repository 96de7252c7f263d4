/** Per-epoch statistics produced by the trainer. */
export interface EpochMetrics {
  epoch: number;
  /** Mean training loss over the epoch's batches, before each update. */
  trainLoss: number;
  /** Loss on the full training set after the epoch. */
  loss: number;
  accuracy: number;
  batches: number;
}

/** Interface for training observers to receive epoch-level callbacks. */
export interface TrainingObserver {
  onEpochComplete(metrics: EpochMetrics): void;
  /** Called once when training stops, early or not. */
  onTrainingEnd?(history: readonly EpochMetrics[], stoppedEarly: boolean): void;
}
