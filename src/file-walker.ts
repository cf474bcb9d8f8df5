/**
 * Directory enumeration backed by fast-glob.
 */

import glob from 'fast-glob';
import { statSync } from 'fs';
import { basename, resolve } from 'path';
import { FileDescriptor } from './types.js';

export type DirectoryWalker = (root: string, recursive: boolean) => Iterable<FileDescriptor>;

/**
 * A finite walk that can be iterated more than once; every iteration lists
 * the tree again, so it reflects moves made by an earlier pass.
 */
export class FileWalk implements Iterable<FileDescriptor> {
  readonly root: string;
  readonly recursive: boolean;

  constructor(root: string, recursive: boolean) {
    this.root = resolve(root);
    this.recursive = recursive;
  }

  *[Symbol.iterator](): Iterator<FileDescriptor> {
    const entries = glob.sync(this.recursive ? '**/*' : '*', {
      cwd: this.root,
      absolute: true,
      onlyFiles: true,
      dot: true,
      stats: true,
      followSymbolicLinks: false,
      suppressErrors: true,
    });

    for (const entry of entries) {
      let size: number;
      let mtimeMs: number;
      if (entry.stats) {
        size = entry.stats.size;
        mtimeMs = entry.stats.mtimeMs;
      } else {
        try {
          const stats = statSync(entry.path);
          size = stats.size;
          mtimeMs = stats.mtimeMs;
        } catch {
          // Vanished between listing and stat
          continue;
        }
      }

      yield {
        path: resolve(entry.path),
        name: basename(entry.path),
        size,
        mtimeMs,
      };
    }
  }
}

export const walkFiles: DirectoryWalker = (root, recursive) => new FileWalk(root, recursive);
