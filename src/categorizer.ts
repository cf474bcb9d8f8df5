/**
 * Maps a file to its type, size or date bucket. Pure apart from the content
 * sniff for unknown extensions; always returns a label.
 */

import { extname } from 'path';
import type { OrganizerConfig } from './config.js';
import { mimeToType, sniffMimeType } from './mime-sniffer.js';
import { DATE_CATEGORIES, DateCategory, Dimension, FileDescriptor } from './types.js';

/** Document extensions that are reported as plain text instead. */
export const TEXT_EXTENSIONS = new Set(['.txt', '.md', '.csv', '.log']);

const DAY_MS = 24 * 60 * 60 * 1000;

export type CategorizerConfig = Pick<OrganizerConfig, 'typeExtensions' | 'sizeThresholds'>;

type Classifiable = Pick<FileDescriptor, 'path' | 'name' | 'size' | 'mtimeMs'>;

function startOfDay(date: Date): number {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate()).getTime();
}

export class Categorizer {
  private typeExtensions: Record<string, string[]>;
  private sizeOrder: Array<{ label: string; bound: number }>;
  private openEndedLabel: string;
  private now: () => Date;

  constructor(config: CategorizerConfig, now: () => Date = () => new Date()) {
    this.typeExtensions = config.typeExtensions;
    this.now = now;

    this.sizeOrder = Object.entries(config.sizeThresholds)
      .map(([label, bound]) => ({ label, bound: bound ?? Infinity }))
      .sort((left, right) => left.bound - right.bound);

    const unbounded = this.sizeOrder.find(entry => entry.bound === Infinity);
    const largest = this.sizeOrder[this.sizeOrder.length - 1];
    this.openEndedLabel = unbounded?.label ?? largest?.label ?? 'huge';
  }

  classify(file: Classifiable, dimension: Dimension): string {
    switch (dimension) {
      case 'type':
        return this.classifyType(file);
      case 'size':
        return this.classifySize(file.size);
      case 'date':
        return this.classifyDate(file.mtimeMs);
    }
  }

  classifyType(file: Pick<FileDescriptor, 'path' | 'name'>): string {
    const extension = extname(file.name).toLowerCase();

    if (extension) {
      for (const [label, extensions] of Object.entries(this.typeExtensions)) {
        if (!extensions.includes(extension)) continue;
        if (label === 'documents' && TEXT_EXTENSIONS.has(extension)) {
          return 'text';
        }
        return label;
      }
    }

    return mimeToType(sniffMimeType(file.path));
  }

  classifySize(size: number): string {
    for (const { label, bound } of this.sizeOrder) {
      if (size < bound) return label;
    }
    return this.openEndedLabel;
  }

  /**
   * Calendar-based buckets, checked in order; the first match wins.
   */
  classifyDate(mtimeMs: number): DateCategory {
    const now = this.now();
    const modified = new Date(mtimeMs);
    const daysAgo = Math.round((startOfDay(now) - startOfDay(modified)) / DAY_MS);

    if (daysAgo === 0) return 'today';
    if (daysAgo <= 7) return 'this_week';
    if (modified.getFullYear() === now.getFullYear() && modified.getMonth() === now.getMonth()) {
      return 'this_month';
    }
    if (modified.getFullYear() === now.getFullYear()) return 'this_year';
    return 'older';
  }

  /**
   * Canonical report order of the labels of a dimension.
   */
  order(dimension: Exclude<Dimension, 'type'>): string[] {
    return dimension === 'size'
      ? this.sizeOrder.map(entry => entry.label)
      : [...DATE_CATEGORIES];
  }
}
