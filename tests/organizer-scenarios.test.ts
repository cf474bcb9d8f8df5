import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_CONFIG } from '../src/config.js';
import { InvalidArgumentError } from '../src/errors.js';
import { FileManager } from '../src/file-manager.js';
import { Logger } from '../src/logger.js';

describe('organizer scenarios', () => {
  let root: string;
  let state: string;
  let manager: FileManager;

  const write = (relative: string, content: string = relative): string => {
    const target = path.join(root, relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
    return target;
  };

  const snapshot = (): string[] =>
    fs.readdirSync(root, { recursive: true, encoding: 'utf-8' }).sort();

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'organizer-scenario-')));
    state = fs.mkdtempSync(path.join(os.tmpdir(), 'organizer-scenario-state-'));
    manager = new FileManager({
      config: { ...DEFAULT_CONFIG, database: { path: path.join(state, 'organizer.db') } },
      logger: new Logger({ context: 'scenario', level: 'error' }),
    });
  });

  afterEach(() => {
    manager.close();
    fs.rmSync(root, { recursive: true, force: true });
    fs.rmSync(state, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('restores a moved file with a single undo', () => {
    const source = write('inbox/letter.txt', 'dear reader');
    const destination = path.join(root, 'archive', 'letter.txt');

    manager.moveFile(source, destination);
    expect(manager.undo(1).success).toBe(true);

    expect(fs.readFileSync(source, 'utf-8')).toBe('dear reader');
    expect(fs.existsSync(destination)).toBe(false);
    expect(manager.getActionHistory()).toEqual([]);
  });

  it('undoes the most recent moves first', () => {
    const [a, b, c] = ['a.txt', 'b.txt', 'c.txt'].map(name => write(name));
    for (const source of [a, b, c]) {
      manager.moveFile(source, path.join(root, 'moved', path.basename(source)));
    }

    manager.undo(2);

    expect(fs.existsSync(c)).toBe(true);
    expect(fs.existsSync(b)).toBe(true);
    expect(fs.existsSync(a)).toBe(false);
    expect(fs.readdirSync(path.join(root, 'moved'))).toEqual(['a.txt']);

    manager.undo('all');

    expect(fs.existsSync(a)).toBe(true);
    expect(fs.readdirSync(path.join(root, 'moved'))).toEqual([]);
  });

  it('drops an unrestorable delete from history', () => {
    const temp = write('scratch.tmp');
    expect(manager.cleanTempFiles(root)).toEqual([temp]);

    const result = manager.undo(1);

    expect(result.success).toBe(false);
    expect(result.outcomes.map(outcome => outcome.status)).toEqual(['unrestorable']);
    expect(fs.existsSync(temp)).toBe(false);
    expect(manager.getActionHistory()).toEqual([]);
  });

  it('never overwrites when two files share a destination name', () => {
    const first = write('one/name.ext', 'first');
    const second = write('two/name.ext', 'second');
    const target = path.join(root, 'shared', 'name.ext');

    manager.moveFile(first, target);
    manager.moveFile(second, target);

    expect(fs.readdirSync(path.join(root, 'shared')).sort()).toEqual(['name.ext', 'name_1.ext']);
    expect(fs.readFileSync(target, 'utf-8')).toBe('first');
    expect(fs.readFileSync(path.join(root, 'shared', 'name_1.ext'), 'utf-8')).toBe('second');
  });

  it('finds exactly one duplicate group for three copies and one unique file', () => {
    write('copy-1.bin', 'payload');
    write('copy-2.bin', 'payload');
    write('copy-3.bin', 'payload');
    const unique = write('unique.bin', 'something else');

    const groups = [...manager.findDuplicates([root]).values()];

    expect(groups).toHaveLength(1);
    expect(groups[0]).toHaveLength(3);
    expect(groups[0]).not.toContain(unique);
  });

  it('rejects a negative age without touching the tree', () => {
    write('ancient.txt');
    const before = snapshot();

    expect(() => manager.cleanOldFiles(root, -1)).toThrow(InvalidArgumentError);

    expect(snapshot()).toEqual(before);
    expect(manager.getActionHistory()).toEqual([]);
  });

  it('previews a sort exactly as it then happens', () => {
    write('a.png');
    write('b.mp3');
    write('c.zip');
    write('deep/d.pdf');
    const before = snapshot();

    const preview = manager.sort(root, 'type', { recursive: true, dryRun: true });
    expect(manager.sort(root, 'type', { recursive: true, dryRun: true })).toEqual(preview);
    expect(snapshot()).toEqual(before);

    expect(manager.sort(root, 'type', { recursive: true })).toEqual(preview);
    expect(manager.getActionHistory()).toHaveLength(4);
  });

  it('reports the same totals as text and JSON', () => {
    write('a.txt', 'x'.repeat(10));
    write('nested/b.txt', 'y'.repeat(32));

    const text = manager.generateReport(root, { humanReadable: false });
    const json: unknown = JSON.parse(manager.generateReport(root, { format: 'json' }));

    expect(text).toContain('Total files: 2\nTotal size: 42 B');
    expect(json).toMatchObject({ totalFiles: 2, totalSize: 42 });
  });
});
