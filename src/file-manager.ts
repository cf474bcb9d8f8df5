/**
 * File Manager - batch operations over a directory tree
 *
 * Every live mutation goes through the safe mover (or unlink) first and is
 * journaled only after it succeeded. Dry runs compute the same groupings
 * without touching the filesystem or the journal.
 */

import { lstatSync, statSync, unlinkSync } from 'fs';
import { basename, dirname, isAbsolute, join, resolve, sep } from 'path';
import { ActionJournal } from './action-journal.js';
import { BatchReport, processBatch, summarizeBatch } from './batch-processor.js';
import { Categorizer } from './categorizer.js';
import { DEFAULT_CONFIG, OrganizerConfig } from './config.js';
import { ContentHasher, hashFile } from './content-hasher.js';
import { IN_MEMORY, OrganizerDatabase, openDatabase } from './database.js';
import { DuplicateIndex } from './duplicate-index.js';
import { InvalidArgumentError, NotFoundError, errorMessage, toFileSystemError } from './errors.js';
import { FileIndex } from './file-index.js';
import { DirectoryWalker, walkFiles } from './file-walker.js';
import { Logger } from './logger.js';
import { collectStats, renderJson, renderText } from './report.js';
import { moveSafely, resolveAvailablePath } from './safe-mover.js';
import {
  ActionEntry,
  ActionKind,
  BatchOptions,
  DIMENSIONS,
  Dimension,
  FileDescriptor,
  FileRecord,
  MoveRule,
  ReportFormat,
  UndoCount,
  UndoResult,
} from './types.js';
import { UndoEngine } from './undo-engine.js';

/** Lower-case name prefixes or suffixes that mark a temporary file. */
export const TEMP_MARKERS = ['~$', '.tmp', '.temp', '.swp', '.bak', '.old', '.cache'];

const SECONDS_PER_DAY = 86400;

/** SQLite keeps these beside the database file. */
const STORE_SUFFIXES = ['', '-wal', '-shm', '-journal'];

export function isTempFile(name: string): boolean {
  const lower = name.toLowerCase();
  return TEMP_MARKERS.some(marker => lower.startsWith(marker) || lower.endsWith(marker));
}

export function parseDimension(value: string): Dimension {
  const match = DIMENSIONS.find(dimension => dimension === value);
  if (!match) {
    throw new InvalidArgumentError(`Invalid dimension: ${value}. Expected one of: ${DIMENSIONS.join(', ')}`);
  }
  return match;
}

export function parseReportFormat(value: string): ReportFormat {
  if (value !== 'text' && value !== 'json') {
    throw new InvalidArgumentError(`Invalid report format: ${value}. Expected text or json`);
  }
  return value;
}

export interface FileManagerOptions {
  config?: OrganizerConfig;
  /** Use an already open store instead of `config.database.path`. */
  database?: OrganizerDatabase;
  walker?: DirectoryWalker;
  hasher?: ContentHasher;
  now?: () => Date;
  logger?: Logger;
}

export interface ReportOptions {
  recursive?: boolean;
  format?: ReportFormat;
  humanReadable?: boolean;
}

interface PlannedMove {
  source: string;
  destination: string;
}

export class FileManager {
  readonly config: OrganizerConfig;
  readonly journal: ActionJournal;
  readonly index: FileIndex;
  readonly categorizer: Categorizer;
  private duplicates: DuplicateIndex;
  private undoEngine: UndoEngine;
  private db: OrganizerDatabase;
  private ownsDatabase: boolean;
  private walker: DirectoryWalker;
  private now: () => Date;
  private logger: Logger;

  constructor(options: FileManagerOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? new Logger({ context: 'file-manager' });

    this.ownsDatabase = !options.database;
    this.db = options.database ?? openDatabase(this.config.database.path);
    const databasePath = options.database || this.config.database.path === IN_MEMORY
      ? null
      : resolve(this.config.database.path);

    const storeFiles = new Set(
      databasePath ? STORE_SUFFIXES.map(suffix => `${databasePath}${suffix}`) : []
    );
    const walker = options.walker ?? walkFiles;
    this.walker = (root, recursive) => excluding(walker(root, recursive), storeFiles);

    this.journal = new ActionJournal(this.db, { now: () => this.now().getTime() });
    this.index = new FileIndex(this.db);
    this.categorizer = new Categorizer(this.config, this.now);
    this.duplicates = new DuplicateIndex(this.index, this.categorizer, {
      walker: this.walker,
      hasher: options.hasher ?? hashFile,
      reuseFingerprints: this.config.index.reuseFingerprints,
      now: this.now,
      logger: this.logger,
    });
    this.undoEngine = new UndoEngine(this.journal, { logger: this.logger });
  }

  /**
   * Group files by category and, unless dry-running, move each into
   * `<directory>/<category>/`.
   */
  sort(directory: string, dimension: Dimension, options: BatchOptions = {}): Map<string, string[]> {
    const root = this.requireDirectory(directory);
    const criterion = parseDimension(dimension);

    const groups = new Map<string, string[]>();
    const planned: PlannedMove[] = [];

    for (const file of this.listFiles(root, options.recursive ?? false)) {
      const category = this.categorizer.classify(file, criterion);
      appendTo(groups, category, file.path);

      const targetDir = join(root, category);
      if (dirname(file.path) !== targetDir) {
        planned.push({ source: file.path, destination: join(targetDir, file.name) });
      }
    }

    if (!options.dryRun) {
      this.relocateAll(planned, 'move');
    }
    return groups;
  }

  /**
   * Regex rename of file names (JavaScript replacement syntax, all matches).
   * Maps each changed path to its requested new path.
   */
  renameBatch(
    directory: string,
    pattern: string,
    replacement: string,
    options: BatchOptions = {}
  ): Map<string, string> {
    const root = this.requireDirectory(directory);
    const regex = compilePattern(pattern, 'g');

    const renames = new Map<string, string>();
    for (const file of this.listFiles(root, options.recursive ?? false)) {
      const newName = file.name.replace(regex, replacement);
      if (newName === file.name) continue;

      if (!newName || newName.includes('/') || newName.includes(sep)) {
        this.logger.warn(`Skipping ${file.path}: "${newName}" is not a valid file name`);
        continue;
      }
      renames.set(file.path, join(dirname(file.path), newName));
    }

    if (!options.dryRun) {
      this.relocateAll(
        [...renames].map(([source, destination]) => ({ source, destination })),
        'rename'
      );
    }
    return renames;
  }

  /**
   * Move files to the destination of the first rule whose pattern matches
   * the file name. Relative destinations resolve against `directory`.
   */
  moveByRules(directory: string, rules: readonly MoveRule[], options: BatchOptions = {}): Map<string, string[]> {
    const root = this.requireDirectory(directory);

    const compiled: Array<{ regex: RegExp; rule: MoveRule; target: string }> = [];
    for (const rule of rules) {
      try {
        compiled.push({
          regex: compilePattern(rule.pattern),
          rule,
          target: isAbsolute(rule.destination) ? rule.destination : resolve(root, rule.destination),
        });
      } catch (error) {
        this.logger.warn(`Skipping rule ${rule.pattern}: ${errorMessage(error)}`);
      }
    }

    const groups = new Map<string, string[]>();
    const planned: PlannedMove[] = [];

    for (const file of this.listFiles(root, options.recursive ?? false)) {
      const match = compiled.find(({ regex }) => regex.test(file.name));
      if (!match) continue;

      appendTo(groups, match.rule.destination, file.path);
      if (dirname(file.path) !== match.target) {
        planned.push({ source: file.path, destination: join(match.target, file.name) });
      }
    }

    if (!options.dryRun) {
      this.relocateAll(planned, 'move');
    }
    return groups;
  }

  /**
   * Move a single file, resolving name collisions. An existing directory as
   * destination receives the file under its own name. Returns the final path
   * (the path it would get, on a dry run).
   */
  moveFile(source: string, destination: string, options: Pick<BatchOptions, 'dryRun'> = {}): string {
    const from = resolve(source);
    const requested = resolve(destination);
    const to = isExistingDirectory(requested) ? join(requested, basename(from)) : requested;

    if (options.dryRun) {
      try {
        lstatSync(from);
      } catch (error) {
        throw toFileSystemError(error, from);
      }
      return resolveAvailablePath(to);
    }

    const finalPath = moveSafely(from, to);
    this.record('move', from, finalPath);
    return finalPath;
  }

  findDuplicates(directories: readonly string[]): Map<string, string[]> {
    const roots = directories.map(directory => this.requireDirectory(directory));
    return this.duplicates.findDuplicates(roots);
  }

  cleanTempFiles(directory: string, options: BatchOptions = {}): string[] {
    const root = this.requireDirectory(directory);
    const matches = this.listFiles(root, options.recursive ?? true)
      .filter(file => isTempFile(file.name))
      .map(file => file.path);

    if (!options.dryRun) {
      this.deleteAll(matches, 'temporary');
    }
    return matches;
  }

  /**
   * Files whose modification time is more than `days` days in the past.
   */
  cleanOldFiles(directory: string, days: number, options: BatchOptions = {}): string[] {
    const root = this.requireDirectory(directory);
    if (!Number.isFinite(days) || days < 0) {
      throw new InvalidArgumentError(`Day count must be zero or positive, got ${days}`);
    }

    const threshold = this.now().getTime() - days * SECONDS_PER_DAY * 1000;
    const matches = this.listFiles(root, options.recursive ?? true)
      .filter(file => file.mtimeMs < threshold)
      .map(file => file.path);

    if (!options.dryRun) {
      this.deleteAll(matches, 'old');
    }
    return matches;
  }

  generateReport(directory: string, options: ReportOptions = {}): string {
    const format = parseReportFormat(options.format ?? 'text');
    const root = this.requireDirectory(directory);

    const stats = collectStats(root, this.listFiles(root, options.recursive ?? true), this.categorizer);
    return format === 'json' ? renderJson(stats) : renderText(stats, options.humanReadable ?? true);
  }

  getActionHistory(limit?: number): ActionEntry[] {
    return this.journal.history(limit);
  }

  undo(count: UndoCount = 1): UndoResult {
    return this.undoEngine.undo(count);
  }

  /**
   * Categories (and optionally the fingerprint) of one file.
   */
  describe(filePath: string, options: { withFingerprint?: boolean } = {}): FileRecord {
    const path = resolve(filePath);
    let size: number;
    let mtimeMs: number;
    try {
      const stats = statSync(path);
      size = stats.size;
      mtimeMs = stats.mtimeMs;
    } catch (error) {
      throw toFileSystemError(error, path);
    }

    const file: FileDescriptor = { path, name: basename(path), size, mtimeMs };
    const record: FileRecord = {
      path,
      size,
      modifiedAt: new Date(mtimeMs),
      categories: {
        type: this.categorizer.classify(file, 'type'),
        size: this.categorizer.classify(file, 'size'),
        date: this.categorizer.classify(file, 'date'),
      },
    };

    if (options.withFingerprint) {
      record.fingerprint = this.duplicates.fingerprint(file);
    }
    return record;
  }

  close(): void {
    if (this.ownsDatabase && this.db.open) {
      this.db.close();
    }
  }

  private requireDirectory(directory: string): string {
    const root = resolve(directory);
    let isDirectory: boolean;
    try {
      isDirectory = statSync(root).isDirectory();
    } catch (error) {
      throw toFileSystemError(error, root);
    }
    if (!isDirectory) {
      throw new NotFoundError(`Not a directory: ${root}`, { path: root });
    }
    return root;
  }

  /**
   * Snapshot of the walk, taken before anything moves.
   */
  private listFiles(root: string, recursive: boolean): FileDescriptor[] {
    return [...this.walker(root, recursive)];
  }

  private relocateAll(planned: PlannedMove[], kind: 'move' | 'rename'): void {
    const report = processBatch(planned, ({ source, destination }) => {
      const finalPath = moveSafely(source, destination);
      this.record(kind, source, finalPath);
      return finalPath;
    });
    this.logFailures(report, kind);
  }

  private deleteAll(paths: string[], label: string): void {
    const report = processBatch(paths, path => {
      try {
        unlinkSync(path);
      } catch (error) {
        throw toFileSystemError(error, path);
      }
      this.logger.info(`Deleted ${label} file ${path}`);
      this.record('delete', path, null);
    });
    this.logFailures(report, 'delete');
  }

  private logFailures<T>(report: BatchReport<T, unknown>, kind: ActionKind): void {
    for (const result of report.results) {
      if (result.success) continue;
      this.logger.error(`Failed to ${kind} ${describeItem(result.item)}: ${result.error?.message ?? 'unknown error'}`);
    }
    this.logger.info(`Batch ${kind} finished`, summarizeBatch(report));
  }

  /**
   * Journal a completed mutation. A failed write leaves the mutation in
   * place but unreversible, so it is logged as an error right away.
   */
  private record(kind: ActionKind, source: string, destination: string | null): number | undefined {
    try {
      return kind === 'delete'
        ? this.journal.append(kind, source)
        : this.journal.append(kind, source, destination ?? '');
    } catch (error) {
      this.logger.error(
        `Journal write failed; ${kind} of ${source} cannot be undone`,
        error instanceof Error ? error : undefined,
        { source, destination }
      );
      return undefined;
    }
  }
}

/**
 * Restartable view of a walk without the given paths.
 */
function excluding(files: Iterable<FileDescriptor>, paths: ReadonlySet<string>): Iterable<FileDescriptor> {
  return {
    *[Symbol.iterator]() {
      for (const file of files) {
        if (!paths.has(file.path)) yield file;
      }
    },
  };
}

function isExistingDirectory(path: string): boolean {
  try {
    return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
  } catch (error) {
    throw toFileSystemError(error, path);
  }
}

function appendTo(groups: Map<string, string[]>, key: string, value: string): void {
  const group = groups.get(key);
  if (group) group.push(value);
  else groups.set(key, [value]);
}

function compilePattern(pattern: string, flags?: string): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    throw new InvalidArgumentError(`Invalid regular expression "${pattern}": ${errorMessage(error)}`, { pattern });
  }
}

function describeItem(item: unknown): string {
  if (typeof item === 'string') return item;
  if (typeof item === 'object' && item !== null && 'source' in item && typeof item.source === 'string') {
    return item.source;
  }
  return String(item);
}
