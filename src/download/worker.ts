import type { BodyChunk, HttpClient, HttpResponse } from '../http/types.js';
import type { ThroughputAggregator } from './aggregator.js';
import { formatRangeHeader } from './ranges.js';
import type { ByteRange } from './ranges.js';
import { TransferError, toError } from '../errors.js';
import type { FailedRange } from '../errors.js';
import { debug } from '../utils/logger.js';

export interface RangeDownloadOptions {
  client: HttpClient;
  url: string;
  range: ByteRange;
  // Bytes the range must yield; a short or long body is a transfer failure
  expectedBytes: number;
  aggregator: ThroughputAggregator;
}

function chunkLength(chunk: BodyChunk): number {
  return typeof chunk === 'string' ? Buffer.byteLength(chunk) : chunk.byteLength;
}

/**
 * Stream one byte range and feed every chunk's length to the aggregator.
 * Resolves with the number of bytes received.
 */
export async function downloadRange(options: RangeDownloadOptions): Promise<number> {
  const { client, url, range, expectedBytes, aggregator } = options;
  const header = formatRangeHeader(range);
  const failed: FailedRange = { index: range.index, header };

  debug('Worker starting', { worker: range.index, range: header });

  let response: HttpResponse;
  try {
    response = await client.request({ method: 'GET', url, headers: { Range: header } });
  } catch (error) {
    throw new TransferError(`Request for ${header} failed: ${toError(error).message}`, failed, toError(error));
  }

  if (!response.ok) {
    response.discard();
    throw new TransferError(`HTTP ${response.status}: ${response.statusText} for ${header}`, failed);
  }

  let received = 0;
  let overran = false;
  try {
    for await (const chunk of response.body) {
      const bytes = chunkLength(chunk);
      received += bytes;
      // A server that ignores Range sends the whole resource; stop at the first excess chunk
      if (received > expectedBytes) {
        overran = true;
        break;
      }
      aggregator.record(bytes);
    }
  } catch (error) {
    throw new TransferError(`Reading ${header} failed after ${received} bytes: ${toError(error).message}`, failed, toError(error));
  }

  if (overran) {
    response.discard();
    throw new TransferError(`Range ${header} overran its ${expectedBytes} bytes after ${received}`, failed);
  }
  if (received !== expectedBytes) {
    throw new TransferError(`Range ${header} ended after ${received} of ${expectedBytes} bytes`, failed);
  }

  debug('Worker finished', { worker: range.index, bytes: received });
  return received;
}
