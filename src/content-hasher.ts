/**
 * SHA-256 content fingerprints, read in fixed-size blocks.
 */

import { createHash } from 'crypto';
import { closeSync, openSync, readSync } from 'fs';
import { toFileSystemError } from './errors.js';

export const HASH_BLOCK_SIZE = 64 * 1024;

export type ContentHasher = (filePath: string) => string;

export const hashFile: ContentHasher = (filePath: string): string => {
  const digest = createHash('sha256');
  const buffer = Buffer.alloc(HASH_BLOCK_SIZE);
  let fd: number | undefined;

  try {
    fd = openSync(filePath, 'r');
    let bytesRead = readSync(fd, buffer, 0, HASH_BLOCK_SIZE, null);
    while (bytesRead > 0) {
      digest.update(buffer.subarray(0, bytesRead));
      bytesRead = readSync(fd, buffer, 0, HASH_BLOCK_SIZE, null);
    }
  } catch (error) {
    throw toFileSystemError(error, filePath);
  } finally {
    if (fd !== undefined) closeSync(fd);
  }

  return digest.digest('hex');
};
