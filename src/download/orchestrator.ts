import { availableParallelism } from 'os';
import { performance } from 'perf_hooks';
import type { HttpClient, HttpResponse } from '../http/types.js';
import { ThroughputAggregator, averageSpeed } from './aggregator.js';
import type { Clock } from './aggregator.js';
import { SpeedReporter } from './reporter.js';
import type { LineOutput } from './reporter.js';
import { downloadRange } from './worker.js';
import { formatRangeHeader, partitionRanges, rangeLength } from './ranges.js';
import { formatSummaryLine } from './format.js';
import { SizeUnavailableError, TransferError, toError } from '../errors.js';
import { getConfig } from '../config/index.js';
import type { Config } from '../config/types.js';
import { debug, error, info } from '../utils/logger.js';

export interface ParallelDownloaderOptions {
  client: HttpClient;
  /** Worker count. Defaults to the host's available parallelism. */
  concurrency?: number;
  output?: LineOutput;
  config?: Config;
  now?: Clock;
}

export interface DownloadSummary {
  url: string;
  contentLength: number;
  workers: number;
  totalBytes: number;
  /** Bytes per second averaged over the closed windows still in the rolling history */
  averageSpeed: number;
  durationMs: number;
}

/**
 * Parse a content-length header value. Only plain decimal digits are accepted.
 */
export function parseContentLength(value: string | null): number {
  if (value === null) {
    throw new SizeUnavailableError('Content-Length header not found', null);
  }
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new SizeUnavailableError(`Invalid Content-Length header: "${value}"`, value);
  }
  const length = Number(trimmed);
  if (!Number.isSafeInteger(length)) {
    throw new SizeUnavailableError(`Content-Length header out of range: "${value}"`, value);
  }
  return length;
}

export class ParallelDownloader {
  private readonly client: HttpClient;
  private readonly concurrency: number;
  private readonly output: LineOutput;
  private readonly config: Config;
  private readonly now: Clock;

  constructor(options: ParallelDownloaderOptions) {
    this.client = options.client;
    this.concurrency = options.concurrency ?? availableParallelism();
    this.output = options.output ?? ((line) => console.log(line));
    this.config = options.config ?? getConfig();
    this.now = options.now ?? (() => performance.now());
  }

  async download(url: string): Promise<DownloadSummary> {
    const startTime = Date.now();
    const contentLength = await this.getContentLength(url);
    const ranges = partitionRanges(contentLength, this.concurrency);

    info('Starting parallel download', {
      url,
      contentLength,
      workers: ranges.length,
      ranges: ranges.map(formatRangeHeader),
    });

    // Window start is fixed here, before any worker exists
    const aggregator = new ThroughputAggregator({
      windowMs: this.config.throughput.windowMs,
      windowCapacity: this.config.throughput.windowCapacity,
      now: this.now,
    });
    const reporter = new SpeedReporter(aggregator, {
      intervalMs: this.config.reporter.intervalMs,
      output: this.output,
    });
    const stopReporting = new AbortController();

    reporter.start(stopReporting.signal);
    try {
      await Promise.all(
        ranges.map((range) =>
          downloadRange({
            client: this.client,
            url,
            range,
            expectedBytes: rangeLength(range, contentLength),
            aggregator,
          })
        )
      );
    } catch (err) {
      error('Download failed', { url, error: toError(err).message });
      throw err;
    } finally {
      stopReporting.abort();
    }

    const { totalBytesDownloaded, recentWindows } = aggregator.snapshot();
    const speed = averageSpeed(recentWindows);
    this.output(formatSummaryLine(totalBytesDownloaded, speed));

    const summary: DownloadSummary = {
      url,
      contentLength,
      workers: ranges.length,
      totalBytes: totalBytesDownloaded,
      averageSpeed: speed,
      durationMs: Date.now() - startTime,
    };

    info('Download completed', { ...summary });

    return summary;
  }

  private async getContentLength(url: string): Promise<number> {
    debug('Getting content length', { url });

    let response: HttpResponse;
    try {
      response = await this.client.request({ method: 'GET', url });
    } catch (err) {
      throw new TransferError(`Metadata request failed: ${toError(err).message}`, undefined, toError(err));
    }

    try {
      if (!response.ok) {
        throw new TransferError(`HTTP ${response.status}: ${response.statusText}`);
      }
      return parseContentLength(response.headers.get('content-length'));
    } finally {
      response.discard();
    }
  }
}
