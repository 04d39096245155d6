import { averageSpeed } from './aggregator.js';
import type { ThroughputAggregator } from './aggregator.js';
import { formatStatusLine } from './format.js';

export type LineOutput = (line: string) => void;

export interface SpeedReporterOptions {
  intervalMs: number;
  output: LineOutput;
  now?: () => Date;
}

/**
 * Prints the rolling average once per interval. Reads the aggregator and
 * holds no state beyond its timer.
 */
export class SpeedReporter {
  private readonly intervalMs: number;
  private readonly output: LineOutput;
  private readonly now: () => Date;
  private timer: NodeJS.Timeout | null = null;
  private signal: AbortSignal | null = null;

  constructor(
    private readonly aggregator: ThroughputAggregator,
    options: SpeedReporterOptions
  ) {
    this.intervalMs = options.intervalMs;
    this.output = options.output;
    this.now = options.now ?? (() => new Date());
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * Begin ticking. Aborting `signal` has the same effect as `stop()`.
   */
  start(signal?: AbortSignal): void {
    if (this.timer || signal?.aborted) {
      return;
    }
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    if (signal) {
      this.signal = signal;
      signal.addEventListener('abort', this.onAbort, { once: true });
    }
  }

  /**
   * Cancel future ticks. A tick already running completes; no final tick is emitted.
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.signal) {
      this.signal.removeEventListener('abort', this.onAbort);
      this.signal = null;
    }
  }

  tick(): string {
    const { recentWindows } = this.aggregator.snapshot();
    const line = formatStatusLine(this.now(), averageSpeed(recentWindows));
    this.output(line);
    return line;
  }

  private readonly onAbort = (): void => {
    this.stop();
  };
}
