import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { IN_MEMORY, OrganizerDatabase, openDatabase } from './database.js';
import { StorageError } from './errors.js';

describe('openDatabase', () => {
  let tempDir: string;
  let db: OrganizerDatabase | undefined;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'organizer-db-'));
  });

  afterEach(() => {
    db?.close();
    db = undefined;
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should create missing parent directories and use WAL', () => {
    const dbPath = join(tempDir, 'nested', 'state', 'organizer.db');

    db = openDatabase(dbPath);

    expect(existsSync(dbPath)).toBe(true);
    expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
  });

  it('should open an in-memory database without touching disk', () => {
    db = openDatabase(IN_MEMORY);

    expect(db.memory).toBe(true);
    expect(db.prepare('SELECT 1 AS one').get()).toEqual({ one: 1 });
  });

  it('should wrap open failures in a StorageError', () => {
    const blocker = join(tempDir, 'blocker');
    writeFileSync(blocker, 'not a directory');

    expect(() => openDatabase(join(blocker, 'organizer.db'))).toThrow(StorageError);
  });
});
