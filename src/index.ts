export { ParallelDownloader, parseContentLength } from './download/orchestrator.js';
export type { DownloadSummary, ParallelDownloaderOptions } from './download/orchestrator.js';
export { ThroughputAggregator, averageSpeed } from './download/aggregator.js';
export type { Clock, ThroughputSnapshot, ThroughputAggregatorOptions } from './download/aggregator.js';
export { SpeedReporter } from './download/reporter.js';
export type { LineOutput, SpeedReporterOptions } from './download/reporter.js';
export { downloadRange } from './download/worker.js';
export type { RangeDownloadOptions } from './download/worker.js';
export { partitionRanges, formatRangeHeader, rangeLength } from './download/ranges.js';
export type { ByteRange } from './download/ranges.js';
export { formatSpeed, formatStatusLine, formatSummaryLine } from './download/format.js';
export { NodeFetchClient, createHttpClient } from './http/index.js';
export type { BodyChunk, HttpClient, HttpMethod, HttpRequest, HttpResponse } from './http/index.js';
export { RangeFetchError, ArgumentError, SizeUnavailableError, TransferError } from './errors.js';
export type { ErrorCode, FailedRange } from './errors.js';
export { ConfigManager, getConfig } from './config/index.js';
export type { Config, LogLevel } from './config/types.js';
