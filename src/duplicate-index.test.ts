import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createHash } from 'crypto';
import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Categorizer } from './categorizer.js';
import { DEFAULT_CONFIG } from './config.js';
import { hashFile } from './content-hasher.js';
import { IN_MEMORY, OrganizerDatabase, openDatabase } from './database.js';
import { DuplicateIndex } from './duplicate-index.js';
import { FileIndex } from './file-index.js';
import { Logger } from './logger.js';

const sha256 = (content: string) => createHash('sha256').update(content).digest('hex');

describe('DuplicateIndex', () => {
  let dir: string;
  let db: OrganizerDatabase;
  let index: FileIndex;
  let categorizer: Categorizer;
  let logger: Logger;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    dir = realpathSync(mkdtempSync(join(tmpdir(), 'organizer-dupes-')));
    db = openDatabase(IN_MEMORY);
    index = new FileIndex(db);
    categorizer = new Categorizer(DEFAULT_CONFIG);
    logger = new Logger({ context: 'duplicates-test', level: 'error' });
    logger.clear();

    writeFileSync(join(dir, 'a.txt'), 'same bytes');
    writeFileSync(join(dir, 'b.txt'), 'same bytes');
    mkdirSync(join(dir, 'sub'));
    writeFileSync(join(dir, 'sub', 'c.txt'), 'same bytes');
    writeFileSync(join(dir, 'd.txt'), 'different bytes');
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should group identical files and leave unique ones out', () => {
    const duplicates = new DuplicateIndex(index, categorizer, { logger }).findDuplicates([dir]);

    expect([...duplicates.keys()]).toEqual([sha256('same bytes')]);
    expect([...(duplicates.get(sha256('same bytes')) ?? [])].sort()).toEqual([
      join(dir, 'a.txt'),
      join(dir, 'b.txt'),
      join(dir, 'sub', 'c.txt'),
    ]);
  });

  it('should record every hashed file in the index', () => {
    new DuplicateIndex(index, categorizer, { logger }).findDuplicates([dir]);

    expect(index.count()).toBe(4);
    expect(index.get(join(dir, 'd.txt'))).toMatchObject({
      fingerprint: sha256('different bytes'),
      size: 15,
      type: 'text',
    });
  });

  it('should count a file reached through overlapping roots once', () => {
    const duplicates = new DuplicateIndex(index, categorizer, { logger })
      .findDuplicates([dir, join(dir, 'sub')]);

    expect(duplicates.get(sha256('same bytes'))).toHaveLength(3);
  });

  it('should skip files that cannot be hashed', () => {
    const hasher = (path: string) => {
      if (path.endsWith('b.txt')) throw new Error('permission denied');
      return hashFile(path);
    };

    const duplicates = new DuplicateIndex(index, categorizer, { logger, hasher }).findDuplicates([dir]);

    expect(duplicates.get(sha256('same bytes'))).toHaveLength(2);
    expect(logger.getLogs('error')[0].message).toBe(`Cannot hash ${join(dir, 'b.txt')}: permission denied`);
  });

  it('should reuse cached fingerprints of unchanged files when enabled', () => {
    const hasher = vi.fn(hashFile);
    new DuplicateIndex(index, categorizer, { logger, hasher }).findDuplicates([dir]);
    expect(hasher).toHaveBeenCalledTimes(4);

    const cached = new DuplicateIndex(index, categorizer, { logger, hasher, reuseFingerprints: true });
    writeFileSync(join(dir, 'd.txt'), 'same bytes');
    const duplicates = cached.findDuplicates([dir]);

    // Only the rewritten file changes size and is hashed again
    expect(hasher).toHaveBeenCalledTimes(5);
    expect(duplicates.get(sha256('same bytes'))).toHaveLength(4);
  });

  it('should return an empty map when nothing repeats', () => {
    const unique = realpathSync(mkdtempSync(join(tmpdir(), 'organizer-unique-')));
    try {
      writeFileSync(join(unique, 'one'), '1');
      writeFileSync(join(unique, 'two'), '2');
      expect(new DuplicateIndex(index, categorizer, { logger }).findDuplicates([unique]).size).toBe(0);
    } finally {
      rmSync(unique, { recursive: true, force: true });
    }
  });
});
