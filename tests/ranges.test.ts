import { describe, it, expect } from 'vitest';
import { partitionRanges, formatRangeHeader, rangeLength } from '../src/download/ranges.js';
import type { ByteRange } from '../src/download/ranges.js';

function expectExactPartition(ranges: ByteRange[], contentLength: number): void {
  expect(ranges[0].start).toBe(0);
  for (let i = 1; i < ranges.length; i++) {
    const previousEnd = ranges[i - 1].end;
    expect(previousEnd).not.toBeNull();
    expect(ranges[i].start).toBe((previousEnd ?? 0) + 1);
  }

  const unbounded = ranges.filter((range) => range.end === null);
  expect(unbounded).toEqual([ranges[ranges.length - 1]]);

  for (const range of ranges) {
    expect(rangeLength(range, contentLength)).toBeGreaterThanOrEqual(1);
  }
  const covered = ranges.reduce((sum, range) => sum + rangeLength(range, contentLength), 0);
  expect(covered).toBe(contentLength);
}

describe('partitionRanges', () => {
  it('should split one million bytes across four workers', () => {
    const ranges = partitionRanges(1_000_000, 4);

    expect(ranges).toEqual([
      { index: 0, start: 0, end: 249_999 },
      { index: 1, start: 250_000, end: 499_999 },
      { index: 2, start: 500_000, end: 749_999 },
      { index: 3, start: 750_000, end: null },
    ]);
    expectExactPartition(ranges, 1_000_000);
  });

  it('should give the division remainder to the last worker', () => {
    const ranges = partitionRanges(10, 3);

    expect(ranges.map(formatRangeHeader)).toEqual(['bytes=0-2', 'bytes=3-5', 'bytes=6-']);
    expect(rangeLength(ranges[2], 10)).toBe(4);
  });

  it('should use a single open-ended range for one worker', () => {
    expect(partitionRanges(5, 1)).toEqual([{ index: 0, start: 0, end: null }]);
  });

  it('should partition every small length and worker count exactly', () => {
    for (let length = 1; length <= 120; length++) {
      for (let workers = 1; workers <= 16; workers++) {
        const ranges = partitionRanges(length, workers);
        expect(ranges.length).toBe(Math.min(length, workers));
        expectExactPartition(ranges, length);
      }
    }
  });

  it('should clamp the worker count when there are fewer bytes than workers', () => {
    expect(partitionRanges(3, 8)).toEqual([
      { index: 0, start: 0, end: 0 },
      { index: 1, start: 1, end: 1 },
      { index: 2, start: 2, end: null },
    ]);
  });

  it('should return no ranges for an empty resource', () => {
    expect(partitionRanges(0, 4)).toEqual([]);
  });

  it('should return frozen ranges', () => {
    const [range] = partitionRanges(100, 2);
    expect(Object.isFrozen(range)).toBe(true);
  });

  it('should reject invalid inputs', () => {
    expect(() => partitionRanges(-1, 4)).toThrow(RangeError);
    expect(() => partitionRanges(1.5, 4)).toThrow(RangeError);
    expect(() => partitionRanges(100, 0)).toThrow('workerCount must be a positive integer (got 0)');
  });
});

describe('formatRangeHeader', () => {
  it('should include both bounds for a bounded range', () => {
    expect(formatRangeHeader({ index: 0, start: 0, end: 249_999 })).toBe('bytes=0-249999');
  });

  it('should omit the end for an open-ended range', () => {
    expect(formatRangeHeader({ index: 3, start: 750_000, end: null })).toBe('bytes=750000-');
  });
});

describe('rangeLength', () => {
  it('should measure open-ended ranges against the content length', () => {
    expect(rangeLength({ index: 3, start: 750_000, end: null }, 1_000_003)).toBe(250_003);
  });
});
