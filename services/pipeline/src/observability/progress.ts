import type { Logger } from '@wxdata/shared';

/** Milliseconds since an arbitrary origin. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export type ProgressSnapshot = {
  processed: number;
  durationSeconds: number;
  ratePerSecond: number;
};

export type ProgressReporterOptions = {
  label: string;
  /** Log every time the running total crosses a multiple of this; 0 disables checkpoints. */
  interval: number;
  logger: Logger;
  clock?: Clock;
  /** Noun used in the log line, e.g. `records` or `batches`. */
  unit?: string;
};

export class ProgressReporter {
  private readonly clock: Clock;
  private readonly startedAt: number;
  private finishedAt: number | null = null;
  private processed = 0;

  constructor(private readonly options: ProgressReporterOptions) {
    this.clock = options.clock ?? systemClock;
    this.startedAt = this.clock();
  }

  advance(count = 1): void {
    if (count <= 0 || this.finishedAt !== null) {
      return;
    }
    const previous = this.processed;
    this.processed += count;

    const { interval } = this.options;
    if (interval > 0 && Math.floor(this.processed / interval) > Math.floor(previous / interval)) {
      const snapshot = this.snapshot();
      this.options.logger.info(
        {
          label: this.options.label,
          processed: snapshot.processed,
          unit: this.options.unit ?? 'items',
          elapsedSeconds: Number(snapshot.durationSeconds.toFixed(2)),
          ratePerSecond: Number(snapshot.ratePerSecond.toFixed(1))
        },
        'progress'
      );
    }
  }

  snapshot(): ProgressSnapshot {
    const end = this.finishedAt ?? this.clock();
    const durationSeconds = Math.max(0, end - this.startedAt) / 1000;
    return {
      processed: this.processed,
      durationSeconds,
      ratePerSecond: durationSeconds > 0 ? this.processed / durationSeconds : 0
    };
  }

  finish(): ProgressSnapshot {
    if (this.finishedAt === null) {
      this.finishedAt = this.clock();
    }
    return this.snapshot();
  }
}
