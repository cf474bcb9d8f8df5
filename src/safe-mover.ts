/**
 * Single-file relocation. `moveSafely` never overwrites: a taken destination
 * becomes `name_1.ext`, `name_2.ext`, ... `restoreExact` writes to exactly the
 * given path or fails.
 *
 * The existence check and the rename are not atomic; the organizer assumes it
 * is the only writer in the tree while a batch runs.
 */

import { copyFileSync, constants, lstatSync, mkdirSync, renameSync, statSync, unlinkSync, utimesSync } from 'fs';
import { dirname, join, parse } from 'path';
import { PathOccupiedError, toFileSystemError } from './errors.js';
import { Logger } from './logger.js';

const logger = new Logger({ context: 'safe-mover' });

export function pathExists(target: string): boolean {
  try {
    lstatSync(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * First free name among `destination`, `stem_1.ext`, `stem_2.ext`, ...
 */
export function resolveAvailablePath(destination: string): string {
  if (!pathExists(destination)) return destination;

  const parsed = parse(destination);
  let counter = 1;
  let candidate = join(parsed.dir, `${parsed.name}_${counter}${parsed.ext}`);
  while (pathExists(candidate)) {
    counter += 1;
    candidate = join(parsed.dir, `${parsed.name}_${counter}${parsed.ext}`);
  }
  return candidate;
}

function isCrossDevice(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EXDEV';
}

/**
 * rename(2), falling back to copy + unlink across filesystems.
 */
function relocate(source: string, destination: string): void {
  try {
    renameSync(source, destination);
    return;
  } catch (error) {
    if (!isCrossDevice(error)) throw error;
  }

  const stats = statSync(source);
  copyFileSync(source, destination, constants.COPYFILE_EXCL);
  try {
    utimesSync(destination, stats.atime, stats.mtime);
    unlinkSync(source);
  } catch (error) {
    discardCopy(destination);
    throw error;
  }
}

// The source is still in place, so the copy must go
function discardCopy(copy: string): void {
  try {
    unlinkSync(copy);
  } catch (error) {
    logger.error(
      `Could not remove partial copy ${copy}`,
      error instanceof Error ? error : new Error(String(error))
    );
  }
}

function requireSource(source: string): void {
  try {
    lstatSync(source);
  } catch (error) {
    throw toFileSystemError(error, source);
  }
}

/**
 * Move `source` to `destination`, creating parent directories and resolving
 * name collisions. Returns the path the file ended up at.
 */
export function moveSafely(source: string, destination: string): string {
  requireSource(source);

  try {
    mkdirSync(dirname(destination), { recursive: true });
  } catch (error) {
    throw toFileSystemError(error, dirname(destination));
  }

  const finalDestination = resolveAvailablePath(destination);
  try {
    relocate(source, finalDestination);
  } catch (error) {
    throw toFileSystemError(error, source);
  }

  logger.info(`Moved ${source} -> ${finalDestination}`);
  return finalDestination;
}

/**
 * Move `source` back to exactly `destination`; never renames around a conflict.
 */
export function restoreExact(source: string, destination: string): void {
  requireSource(source);

  if (pathExists(destination)) {
    throw new PathOccupiedError(`Cannot restore to ${destination}: path is occupied`, {
      source,
      destination,
    });
  }

  try {
    mkdirSync(dirname(destination), { recursive: true });
    relocate(source, destination);
  } catch (error) {
    throw toFileSystemError(error, source);
  }

  logger.info(`Restored ${source} -> ${destination}`);
}
