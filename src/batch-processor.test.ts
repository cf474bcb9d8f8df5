import { describe, it, expect } from 'vitest';
import { processBatch, summarizeBatch } from './batch-processor.js';

describe('processBatch', () => {
  it('should keep going after a failing item', () => {
    const seen: number[] = [];
    const report = processBatch([1, 2, 3], item => {
      seen.push(item);
      if (item === 2) throw new Error('two is bad');
      return item * 10;
    });

    expect(seen).toEqual([1, 2, 3]);
    expect(report.succeeded).toBe(2);
    expect(report.failed).toBe(1);
    expect(report.results.map(result => result.value)).toEqual([10, undefined, 30]);
    expect(report.results[1].error?.message).toBe('two is bad');
  });

  it('should wrap non-Error throws', () => {
    const report = processBatch(['x'], () => {
      throw 'plain string';
    });
    expect(report.results[0].error?.message).toBe('plain string');
  });

  it('should summarize counts', () => {
    const report = processBatch([], () => 0);
    expect(summarizeBatch(report)).toEqual({ processed: 0, succeeded: 0, failed: 0 });
  });
});
