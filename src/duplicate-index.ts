/**
 * Groups files by content fingerprint across one or more roots.
 */

import type { Categorizer } from './categorizer.js';
import { ContentHasher, hashFile } from './content-hasher.js';
import { errorMessage } from './errors.js';
import type { FileIndex } from './file-index.js';
import { DirectoryWalker, walkFiles } from './file-walker.js';
import { Logger } from './logger.js';
import { FileDescriptor, IndexEntry } from './types.js';

export interface DuplicateIndexOptions {
  walker?: DirectoryWalker;
  hasher?: ContentHasher;
  /** Reuse an indexed fingerprint when size and mtime still match. */
  reuseFingerprints?: boolean;
  now?: () => Date;
  logger?: Logger;
}

export class DuplicateIndex {
  private index: FileIndex;
  private categorizer: Categorizer;
  private walker: DirectoryWalker;
  private hasher: ContentHasher;
  private reuseFingerprints: boolean;
  private now: () => Date;
  private logger: Logger;

  constructor(index: FileIndex, categorizer: Categorizer, options: DuplicateIndexOptions = {}) {
    this.index = index;
    this.categorizer = categorizer;
    this.walker = options.walker ?? walkFiles;
    this.hasher = options.hasher ?? hashFile;
    this.reuseFingerprints = options.reuseFingerprints ?? false;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? new Logger({ context: 'duplicates' });
  }

  /**
   * Fingerprint → paths, keeping only groups of two or more. Paths keep
   * walk order. Roots are walked recursively.
   */
  findDuplicates(roots: readonly string[]): Map<string, string[]> {
    const groups = new Map<string, string[]>();
    const seen = new Set<string>();
    let skipped = 0;

    for (const root of roots) {
      for (const file of this.walker(root, true)) {
        if (seen.has(file.path)) continue;
        seen.add(file.path);

        let fingerprint: string;
        try {
          fingerprint = this.fingerprint(file);
        } catch (error) {
          skipped++;
          this.logger.error(`Cannot hash ${file.path}: ${errorMessage(error)}`);
          continue;
        }

        const group = groups.get(fingerprint);
        if (group) group.push(file.path);
        else groups.set(fingerprint, [file.path]);
      }
    }

    const duplicates = new Map<string, string[]>();
    for (const [fingerprint, paths] of groups) {
      if (paths.length > 1) duplicates.set(fingerprint, paths);
    }

    this.logger.info(`Found ${duplicates.size} duplicate group(s)`, {
      scanned: seen.size,
      skipped,
    });
    return duplicates;
  }

  /**
   * Fingerprint one file and refresh its index entry.
   */
  fingerprint(file: FileDescriptor): string {
    if (this.reuseFingerprints) {
      const cached = this.lookup(file.path);
      if (cached && cached.size === file.size && cached.mtimeMs === file.mtimeMs) {
        return cached.fingerprint;
      }
    }

    const fingerprint = this.hasher(file.path);

    try {
      this.index.upsert({
        path: file.path,
        fingerprint,
        size: file.size,
        mtimeMs: file.mtimeMs,
        type: this.categorizer.classifyType(file),
        indexedAt: this.now(),
      });
    } catch (error) {
      this.logger.warn(`Index update failed for ${file.path}`, { cause: errorMessage(error) });
    }

    return fingerprint;
  }

  private lookup(path: string): IndexEntry | undefined {
    try {
      return this.index.get(path);
    } catch (error) {
      this.logger.warn(`Index lookup failed for ${path}`, { cause: errorMessage(error) });
      return undefined;
    }
  }
}
