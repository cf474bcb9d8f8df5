/**
 * Fingerprint cache keyed by path. The filesystem stays authoritative:
 * entries are refreshed whenever a file is hashed and never trusted blindly.
 */

import type { OrganizerDatabase } from './database.js';
import { toStorageError } from './errors.js';
import { IndexEntry } from './types.js';

interface FileRow {
  path: string;
  hash: string;
  size: number;
  mtime: number;
  type: string;
  indexed_at: number;
}

function toEntry(row: FileRow): IndexEntry {
  return {
    path: row.path,
    fingerprint: row.hash,
    size: row.size,
    mtimeMs: row.mtime,
    type: row.type,
    indexedAt: new Date(row.indexed_at),
  };
}

export class FileIndex {
  private db: OrganizerDatabase;

  constructor(db: OrganizerDatabase) {
    this.db = db;
    try {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS files (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          path TEXT UNIQUE NOT NULL,
          hash TEXT NOT NULL,
          size INTEGER NOT NULL,
          mtime REAL NOT NULL,
          type TEXT NOT NULL,
          indexed_at INTEGER NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_files_hash ON files(hash);
      `);
    } catch (error) {
      throw toStorageError(error, 'index schema setup');
    }
  }

  upsert(entry: IndexEntry): void {
    try {
      this.db
        .prepare(
          `INSERT INTO files (path, hash, size, mtime, type, indexed_at)
           VALUES (?, ?, ?, ?, ?, ?)
           ON CONFLICT(path) DO UPDATE SET
             hash = excluded.hash,
             size = excluded.size,
             mtime = excluded.mtime,
             type = excluded.type,
             indexed_at = excluded.indexed_at`
        )
        .run(entry.path, entry.fingerprint, entry.size, entry.mtimeMs, entry.type, entry.indexedAt.getTime());
    } catch (error) {
      throw toStorageError(error, `index ${entry.path}`);
    }
  }

  get(path: string): IndexEntry | undefined {
    try {
      const row = this.db
        .prepare('SELECT path, hash, size, mtime, type, indexed_at FROM files WHERE path = ?')
        .get(path) as FileRow | undefined;
      return row ? toEntry(row) : undefined;
    } catch (error) {
      throw toStorageError(error, `read index entry ${path}`);
    }
  }

  list(): IndexEntry[] {
    try {
      const rows = this.db
        .prepare('SELECT path, hash, size, mtime, type, indexed_at FROM files ORDER BY path')
        .all() as FileRow[];
      return rows.map(toEntry);
    } catch (error) {
      throw toStorageError(error, 'list index');
    }
  }

  count(): number {
    try {
      const row = this.db.prepare('SELECT COUNT(*) AS total FROM files').get() as { total: number };
      return row.total;
    } catch (error) {
      throw toStorageError(error, 'count index');
    }
  }
}
