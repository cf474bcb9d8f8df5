/**
 * Aggregate statistics for a directory and their text / JSON rendering.
 */

import type { Categorizer } from './categorizer.js';
import { CategoryStats, FileDescriptor, ReportStats } from './types.js';

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB', 'EB', 'ZB', 'YB'];

/**
 * `1536` → `1.50 KB`; zero is `0 B`.
 */
export function humanReadableSize(bytes: number): string {
  if (bytes === 0) return '0 B';

  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(2)} ${SIZE_UNITS[unit]}`;
}

export function formatSize(bytes: number, humanReadable: boolean): string {
  return humanReadable ? humanReadableSize(bytes) : `${bytes} B`;
}

function tally(buckets: Map<string, CategoryStats>, label: string, size: number): void {
  const stats = buckets.get(label);
  if (stats) {
    stats.count++;
    stats.size += size;
  } else {
    buckets.set(label, { label, count: 1, size });
  }
}

function inOrder(buckets: Map<string, CategoryStats>, order: string[]): CategoryStats[] {
  const ordered: CategoryStats[] = [];
  for (const label of order) {
    const stats = buckets.get(label);
    if (stats) ordered.push(stats);
  }
  for (const [label, stats] of buckets) {
    if (!order.includes(label)) ordered.push(stats);
  }
  return ordered;
}

export function collectStats(
  directory: string,
  files: Iterable<FileDescriptor>,
  categorizer: Categorizer
): ReportStats {
  const byType = new Map<string, CategoryStats>();
  const bySize = new Map<string, CategoryStats>();
  const byDate = new Map<string, CategoryStats>();
  let totalFiles = 0;
  let totalSize = 0;

  for (const file of files) {
    totalFiles++;
    totalSize += file.size;
    tally(byType, categorizer.classify(file, 'type'), file.size);
    tally(bySize, categorizer.classify(file, 'size'), file.size);
    tally(byDate, categorizer.classify(file, 'date'), file.size);
  }

  return {
    directory,
    totalFiles,
    totalSize,
    byType: [...byType.values()].sort(
      (left, right) => right.count - left.count || left.label.localeCompare(right.label)
    ),
    bySize: inOrder(bySize, categorizer.order('size')),
    byDate: inOrder(byDate, categorizer.order('date')),
  };
}

function section(title: string, rows: CategoryStats[], humanReadable: boolean): string[] {
  if (rows.length === 0) return [];
  return [
    '',
    `${title}:`,
    ...rows.map(row =>
      `  ${row.label}: ${row.count} ${row.count === 1 ? 'file' : 'files'}, ${formatSize(row.size, humanReadable)}`
    ),
  ];
}

export function renderText(stats: ReportStats, humanReadable: boolean): string {
  return [
    `Report for ${stats.directory}`,
    `Total files: ${stats.totalFiles}`,
    `Total size: ${formatSize(stats.totalSize, humanReadable)}`,
    ...section('By type', stats.byType, humanReadable),
    ...section('By size', stats.bySize, humanReadable),
    ...section('By date', stats.byDate, humanReadable),
  ].join('\n');
}

function toObject(rows: CategoryStats[]): Record<string, { count: number; size: number }> {
  const result: Record<string, { count: number; size: number }> = {};
  for (const row of rows) {
    result[row.label] = { count: row.count, size: row.size };
  }
  return result;
}

/**
 * Sizes are always raw bytes in JSON.
 */
export function renderJson(stats: ReportStats): string {
  return JSON.stringify(
    {
      directory: stats.directory,
      totalFiles: stats.totalFiles,
      totalSize: stats.totalSize,
      byType: toObject(stats.byType),
      bySize: toObject(stats.bySize),
      byDate: toObject(stats.byDate),
    },
    null,
    2
  );
}
