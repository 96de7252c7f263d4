import { EpochMetrics, TrainingObserver } from "./types";

export class MetricsCollector implements TrainingObserver {
  private history: EpochMetrics[] = [];

  onEpochComplete(metrics: EpochMetrics): void {
    this.history.push(metrics);
  }

  getHistory(): readonly EpochMetrics[] {
    return this.history;
  }

  /** Epoch with the lowest evaluated loss, if any epoch has run. */
  best(): EpochMetrics | undefined {
    if (this.history.length === 0) return undefined;
    return this.history.reduce((best, h) => (h.loss < best.loss ? h : best));
  }

  printSummary(): void {
    const best = this.best();
    const last = this.history[this.history.length - 1];
    if (!best || !last) return;

    console.log("\n=== Training Summary ===");
    console.log(`Final Loss: ${last.loss.toFixed(4)}`);
    console.log(`Final Accuracy: ${(last.accuracy * 100).toFixed(2)}%`);
    console.log(`Best Epoch: ${best.epoch} (loss ${best.loss.toFixed(4)})`);
    console.log(`Total Epochs: ${this.history.length}`);
  }
}
