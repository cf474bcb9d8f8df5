/**
 * Durable, append-only record of completed move/rename/delete operations.
 *
 * Entries are only ever appended after the filesystem change they describe
 * has succeeded, and are removed once the undo engine has consumed them.
 * Ordering is newest first by timestamp, ties broken by id.
 */

import type { OrganizerDatabase } from './database.js';
import { InvalidArgumentError, StorageError, toStorageError } from './errors.js';
import { ACTION_KINDS, ActionEntry, ActionKind, RelocationKind } from './types.js';

interface ActionRow {
  id: number;
  action_type: string;
  source: string;
  destination: string | null;
  created_at: number;
  metadata: string | null;
}

export interface ActionJournalOptions {
  /** Milliseconds since the epoch. */
  now?: () => number;
}

function parseKind(value: string): ActionKind | undefined {
  return ACTION_KINDS.find(kind => kind === value);
}

function parseMetadata(raw: string | null): Record<string, unknown> | null {
  if (raw === null) return null;
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    return { ...parsed };
  }
  return null;
}

export class ActionJournal {
  private db: OrganizerDatabase;
  private now: () => number;

  constructor(db: OrganizerDatabase, options: ActionJournalOptions = {}) {
    this.db = db;
    this.now = options.now ?? Date.now;
    this.initSchema();
  }

  private initSchema(): void {
    try {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS actions (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          action_type TEXT NOT NULL,
          source TEXT NOT NULL,
          destination TEXT,
          created_at INTEGER NOT NULL,
          metadata TEXT
        );

        CREATE INDEX IF NOT EXISTS idx_actions_order ON actions(created_at DESC, id DESC);
      `);
    } catch (error) {
      throw toStorageError(error, 'journal schema setup');
    }
  }

  /**
   * Record a completed operation. Only call once the filesystem change succeeded.
   */
  append(kind: RelocationKind, source: string, destination: string, metadata?: Record<string, unknown>): number;
  append(kind: 'delete', source: string, destination?: null, metadata?: Record<string, unknown>): number;
  append(
    kind: ActionKind,
    source: string,
    destination: string | null = null,
    metadata?: Record<string, unknown>
  ): number {
    if (kind === 'delete' && destination !== null) {
      throw new InvalidArgumentError('A delete action has no destination', { source, destination });
    }
    if (kind !== 'delete' && !destination) {
      throw new InvalidArgumentError(`A ${kind} action needs a destination`, { source });
    }

    try {
      const last = this.db.prepare('SELECT MAX(created_at) AS last FROM actions').get() as { last: number | null };
      const timestamp = Math.max(this.now(), last.last ?? 0);

      const result = this.db
        .prepare(
          `INSERT INTO actions (action_type, source, destination, created_at, metadata)
           VALUES (?, ?, ?, ?, ?)`
        )
        .run(kind, source, destination, timestamp, metadata ? JSON.stringify(metadata) : null);

      return Number(result.lastInsertRowid);
    } catch (error) {
      throw toStorageError(error, `append ${kind} ${source}`);
    }
  }

  /**
   * Up to `limit` entries, newest first; all entries when `limit` is omitted.
   */
  mostRecent(limit?: number): ActionEntry[] {
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
      throw new InvalidArgumentError(`Invalid entry limit: ${limit}`);
    }

    let rows: ActionRow[];
    try {
      const sql = `SELECT id, action_type, source, destination, created_at, metadata
                   FROM actions ORDER BY created_at DESC, id DESC`;
      rows = (limit === undefined
        ? this.db.prepare(sql).all()
        : this.db.prepare(`${sql} LIMIT ?`).all(limit)) as ActionRow[];
    } catch (error) {
      throw toStorageError(error, 'read journal');
    }

    return rows.map(row => this.toEntry(row));
  }

  /**
   * Read-only view for reporting; never consumes entries.
   */
  history(limit?: number): ActionEntry[] {
    return this.mostRecent(limit);
  }

  /**
   * Remove entries in one transaction.
   */
  delete(ids: readonly number[]): number {
    if (ids.length === 0) return 0;

    try {
      const statement = this.db.prepare('DELETE FROM actions WHERE id = ?');
      const removeAll = this.db.transaction((batch: readonly number[]) => {
        let removed = 0;
        for (const id of batch) {
          removed += statement.run(id).changes;
        }
        return removed;
      });
      return removeAll(ids);
    } catch (error) {
      throw toStorageError(error, `delete ${ids.length} journal entries`);
    }
  }

  count(): number {
    try {
      const row = this.db.prepare('SELECT COUNT(*) AS total FROM actions').get() as { total: number };
      return row.total;
    } catch (error) {
      throw toStorageError(error, 'count journal entries');
    }
  }

  private toEntry(row: ActionRow): ActionEntry {
    const kind = parseKind(row.action_type);
    let metadata: Record<string, unknown> | null;
    try {
      metadata = parseMetadata(row.metadata);
    } catch (error) {
      throw toStorageError(error, `decode metadata of entry ${row.id}`);
    }
    const base = {
      id: row.id,
      source: row.source,
      createdAt: new Date(row.created_at),
      metadata,
    };

    if (kind === 'delete') {
      return { ...base, kind, destination: null };
    }
    if (kind && row.destination) {
      return { ...base, kind, destination: row.destination };
    }
    throw new StorageError(`Corrupt journal entry ${row.id}`, {
      id: row.id,
      kind: row.action_type,
    });
  }
}
