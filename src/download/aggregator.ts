import { performance } from 'perf_hooks';

// Milliseconds from a monotonic source
export type Clock = () => number;

export interface ThroughputSnapshot {
  recentWindows: number[];
  totalBytesDownloaded: number;
  bytesInCurrentWindow: number;
}

export interface ThroughputAggregatorOptions {
  windowMs: number;
  windowCapacity: number;
  now?: Clock;
}

/**
 * Shared byte counters for one transfer.
 *
 * Windows flush opportunistically: a window closes only when a `record` call
 * observes that `windowMs` has elapsed since it opened, so under sparse
 * arrivals a window can span longer than `windowMs`. There is no timer here.
 *
 * `record` and `snapshot` never await, so on Node's single event loop each
 * call runs to completion before any other worker or the reporter can
 * observe the state.
 */
export class ThroughputAggregator {
  private readonly windowMs: number;
  private readonly windowCapacity: number;
  private readonly now: Clock;

  private bytesInCurrentWindow = 0;
  private recentWindows: number[] = [];
  private windowStart: number;
  private totalBytesDownloaded = 0;

  constructor(options: ThroughputAggregatorOptions) {
    const { windowMs, windowCapacity, now = () => performance.now() } = options;
    if (windowMs <= 0) {
      throw new RangeError('windowMs must be a positive number');
    }
    if (!Number.isInteger(windowCapacity) || windowCapacity < 1) {
      throw new RangeError('windowCapacity must be a positive integer');
    }
    this.windowMs = windowMs;
    this.windowCapacity = windowCapacity;
    this.now = now;
    this.windowStart = now();
  }

  record(bytes: number): void {
    if (!Number.isInteger(bytes) || bytes < 0) {
      throw new RangeError(`Recorded byte count must be a non-negative integer (got ${bytes})`);
    }

    this.totalBytesDownloaded += bytes;
    this.bytesInCurrentWindow += bytes;

    const now = this.now();
    if (now - this.windowStart >= this.windowMs) {
      this.recentWindows.push(this.bytesInCurrentWindow);
      if (this.recentWindows.length > this.windowCapacity) {
        this.recentWindows.shift();
      }
      this.bytesInCurrentWindow = 0;
      this.windowStart = now;
    }
  }

  snapshot(): ThroughputSnapshot {
    return {
      recentWindows: [...this.recentWindows],
      totalBytesDownloaded: this.totalBytesDownloaded,
      bytesInCurrentWindow: this.bytesInCurrentWindow,
    };
  }
}

/**
 * Mean bytes per closed window, rounded down. Zero when nothing has closed yet.
 */
export function averageSpeed(windows: readonly number[]): number {
  const total = windows.reduce((sum, bytes) => sum + bytes, 0);
  return Math.floor(total / Math.max(windows.length, 1));
}
