/**
 * Shared types for the file organizer
 */

export type Dimension = 'type' | 'size' | 'date';

export const DIMENSIONS: readonly Dimension[] = ['type', 'size', 'date'];

export type DateCategory = 'today' | 'this_week' | 'this_month' | 'this_year' | 'older';

export const DATE_CATEGORIES: readonly DateCategory[] = [
  'today',
  'this_week',
  'this_month',
  'this_year',
  'older',
];

/**
 * A file as produced by the directory walk: path plus cached stat.
 */
export interface FileDescriptor {
  path: string;
  name: string;
  size: number;
  mtimeMs: number;
}

/**
 * Computed on demand, never persisted.
 */
export interface FileRecord {
  path: string;
  size: number;
  modifiedAt: Date;
  categories: Record<Dimension, string>;
  fingerprint?: string;
}

/**
 * Cached fingerprint of a previously hashed path.
 */
export interface IndexEntry {
  path: string;
  fingerprint: string;
  size: number;
  mtimeMs: number;
  type: string;
  indexedAt: Date;
}

export type RelocationKind = 'move' | 'rename';
export type ActionKind = RelocationKind | 'delete';

export const ACTION_KINDS: readonly ActionKind[] = ['move', 'rename', 'delete'];

interface ActionEntryBase {
  id: number;
  source: string;
  createdAt: Date;
  metadata: Record<string, unknown> | null;
}

export interface RelocationEntry extends ActionEntryBase {
  kind: RelocationKind;
  destination: string;
}

export interface DeletionEntry extends ActionEntryBase {
  kind: 'delete';
  destination: null;
}

/**
 * One completed mutating operation, recorded so it can be reversed.
 */
export type ActionEntry = RelocationEntry | DeletionEntry;

export type ReportFormat = 'text' | 'json';

export interface MoveRule {
  pattern: string;
  destination: string;
}

export interface BatchOptions {
  recursive?: boolean;
  dryRun?: boolean;
}

export type UndoCount = number | 'all';

export type UndoStatus = 'restored' | 'failed' | 'unrestorable';

export interface UndoOutcome {
  entry: ActionEntry;
  status: UndoStatus;
  reason?: string;
}

export interface UndoResult {
  success: boolean;
  outcomes: UndoOutcome[];
  removedIds: number[];
}

export interface CategoryStats {
  label: string;
  count: number;
  size: number;
}

export interface ReportStats {
  directory: string;
  totalFiles: number;
  totalSize: number;
  byType: CategoryStats[];
  bySize: CategoryStats[];
  byDate: CategoryStats[];
}
