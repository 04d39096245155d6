/**
 * A contiguous byte interval owned by exactly one worker.
 * `end` is inclusive; `null` means "to the end of the resource".
 */
export interface ByteRange {
  readonly index: number;
  readonly start: number;
  readonly end: number | null;
}

/**
 * Split `contentLength` bytes into at most `workerCount` contiguous ranges.
 *
 * Every range but the last spans `floor(contentLength / workers)` bytes; the
 * last one is open-ended and absorbs the remainder. The worker count is
 * clamped to the content length so that no bounded range is empty, and an
 * empty resource yields no ranges at all.
 */
export function partitionRanges(contentLength: number, workerCount: number): ByteRange[] {
  if (!Number.isSafeInteger(contentLength) || contentLength < 0) {
    throw new RangeError(`contentLength must be a non-negative integer (got ${contentLength})`);
  }
  if (!Number.isSafeInteger(workerCount) || workerCount < 1) {
    throw new RangeError(`workerCount must be a positive integer (got ${workerCount})`);
  }
  if (contentLength === 0) {
    return [];
  }

  const workers = Math.min(workerCount, contentLength);
  const chunkSize = Math.floor(contentLength / workers);
  const ranges: ByteRange[] = [];

  for (let i = 0; i < workers; i++) {
    const start = i * chunkSize;
    const end = i === workers - 1 ? null : (i + 1) * chunkSize - 1;
    ranges.push(Object.freeze({ index: i, start, end }));
  }

  return ranges;
}

export function formatRangeHeader(range: ByteRange): string {
  return `bytes=${range.start}-${range.end ?? ''}`;
}

/**
 * Number of bytes a range covers within a resource of `contentLength` bytes.
 */
export function rangeLength(range: ByteRange, contentLength: number): number {
  const last = range.end ?? contentLength - 1;
  return last - range.start + 1;
}
