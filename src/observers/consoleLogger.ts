import { EpochMetrics, TrainingObserver } from "./types";

export class ConsoleLogger implements TrainingObserver {
  /** @param every - Log one line every N epochs (the first and last are always logged). */
  constructor(
    private every = 1,
    private total?: number,
  ) {}

  onEpochComplete(m: EpochMetrics): void {
    const isLast = this.total !== undefined && m.epoch === this.total;
    if (m.epoch !== 1 && m.epoch % this.every !== 0 && !isLast) return;
    console.log(
      `Epoch ${m.epoch} | Loss: ${m.loss.toFixed(4)} | Accuracy: ${(m.accuracy * 100).toFixed(1)}%`,
    );
  }

  onTrainingEnd(history: readonly EpochMetrics[], stoppedEarly: boolean): void {
    if (stoppedEarly) {
      console.log(`Early stopping after ${history.length} epochs`);
    }
  }
}
