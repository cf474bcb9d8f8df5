/**
 * Sequential batch processing that never stops at a failing item.
 */

export interface ProcessingResult<T, R> {
  item: T;
  success: boolean;
  value?: R;
  error?: Error;
}

export interface BatchReport<T, R> {
  results: ProcessingResult<T, R>[];
  succeeded: number;
  failed: number;
}

/**
 * Run `processor` over every item in order, collecting one result per item.
 */
export function processBatch<T, R>(
  items: Iterable<T>,
  processor: (item: T) => R
): BatchReport<T, R> {
  const report: BatchReport<T, R> = { results: [], succeeded: 0, failed: 0 };

  for (const item of items) {
    try {
      const value = processor(item);
      report.results.push({ item, success: true, value });
      report.succeeded++;
    } catch (error) {
      report.results.push({
        item,
        success: false,
        error: error instanceof Error ? error : new Error(String(error)),
      });
      report.failed++;
    }
  }

  return report;
}

export function summarizeBatch<T, R>(report: BatchReport<T, R>): Record<string, number> {
  return {
    processed: report.results.length,
    succeeded: report.succeeded,
    failed: report.failed,
  };
}
