/**
 * SQLite connection shared by the action journal and the file index
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { toStorageError } from './errors.js';

export type OrganizerDatabase = Database.Database;

export const IN_MEMORY = ':memory:';

export function openDatabase(dbPath: string): OrganizerDatabase {
  try {
    if (dbPath !== IN_MEMORY) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    return db;
  } catch (error) {
    throw toStorageError(error, `open ${dbPath}`);
  }
}
