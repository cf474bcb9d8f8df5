#!/usr/bin/env node
/**
 * File organizer CLI
 *
 *   file-organizer sort DIR [--by type|size|date] [-r] [--dry-run]
 *   file-organizer rename DIR PATTERN REPLACEMENT [-r] [--dry-run]
 *   file-organizer move DIR --rule PATTERN DEST [--rule ...] [-r] [--dry-run]
 *   file-organizer move SOURCE DEST [--dry-run]
 *   file-organizer duplicates DIR [DIR ...]
 *   file-organizer clean DIR (--temp | --old DAYS) [-r] [--dry-run]
 *   file-organizer report DIR [--json] [--human | --raw] [-o FILE] [-r]
 *   file-organizer history [--limit N]
 *   file-organizer undo [--count N | --all]
 *   file-organizer config get KEY | set KEY VALUE | list
 *
 * Global flags: --config FILE, --db FILE, --verbose, --yes
 */

import { config as loadEnv } from 'dotenv';
import { writeFileSync } from 'fs';
import YAML from 'js-yaml';
import { resolve } from 'path';
import { createInterface } from 'readline';
import { fileURLToPath } from 'url';
import { ConfigManager, OrganizerConfig, applyEnvironment, resolveConfigPath } from './config.js';
import { AppError, InvalidArgumentError, NotFoundError, handleError } from './errors.js';
import { FileManager, parseDimension } from './file-manager.js';
import { Logger } from './logger.js';
import { Dimension, MoveRule, UndoCount } from './types.js';

const logger = new Logger({ context: 'cli' });

export const COMMANDS = ['sort', 'rename', 'move', 'duplicates', 'clean', 'report', 'history', 'undo', 'config'] as const;
export type Command = (typeof COMMANDS)[number];

export interface CliOptions {
  command: Command;
  args: string[];
  configPath?: string;
  dbPath?: string;
  verbose: boolean;
  yes: boolean;
  by?: Dimension;
  /** Undefined keeps each operation's own default. */
  recursive?: boolean;
  dryRun: boolean;
  rules: MoveRule[];
  temp: boolean;
  oldDays?: number;
  json: boolean;
  humanReadable: boolean;
  output?: string;
  count?: UndoCount;
  limit?: number;
}

export interface CliIO {
  print(line: string): void;
  confirm(message: string): Promise<boolean>;
  env: NodeJS.ProcessEnv;
}

export const USAGE = `Usage: file-organizer <command> [options]

Commands:
  sort DIR                      Sort files into category folders (--by type|size|date)
  rename DIR PATTERN REPL       Rename files by regular expression ($1 or $<name> in REPL)
  move DIR --rule PATTERN DEST  Move files by rules (repeat --rule)
  move SOURCE DEST              Move a single file
  duplicates DIR [DIR ...]      List files with identical content (--json, -o FILE)
  clean DIR --temp | --old DAYS Delete temporary or old files
  report DIR                    Summarise a directory (--json, --human, --raw, -o FILE)
  history                       Show journaled actions (--limit N)
  undo                          Reverse recent actions (--count N, --all)
  config get KEY | set KEY VALUE | list

Options:
  -r, --recursive   Descend into subdirectories
  --dry-run         Show what would happen without changing anything
  --yes             Do not ask for confirmation
  --config FILE     Configuration file (YAML or JSON)
  --db FILE         Journal and index database
  --verbose         Debug logging`;

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some(command => command === value);
}

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('--')) {
    throw new InvalidArgumentError(`Missing value for ${flag}`);
  }
  return value;
}

function parseCount(value: string, flag: string, allowZero = false): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < (allowZero ? 0 : 1)) {
    throw new InvalidArgumentError(`Invalid ${flag} value: ${value}`);
  }
  return parsed;
}

export function parseArgs(argv: string[]): CliOptions {
  const [first, ...rest] = argv;
  if (!isCommand(first)) {
    throw new InvalidArgumentError(first ? `Unknown command: ${first}` : 'Missing command');
  }

  const options: CliOptions = {
    command: first,
    args: [],
    verbose: false,
    yes: false,
    dryRun: false,
    rules: [],
    temp: false,
    json: false,
    humanReadable: true,
  };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];

    switch (arg) {
      case '--config':
        options.configPath = requireValue(rest, ++i, arg);
        break;
      case '--db':
        options.dbPath = requireValue(rest, ++i, arg);
        break;
      case '--verbose':
        options.verbose = true;
        break;
      case '--yes':
      case '-y':
        options.yes = true;
        break;
      case '--by':
        options.by = parseDimension(requireValue(rest, ++i, arg));
        break;
      case '-r':
      case '--recursive':
        options.recursive = true;
        break;
      case '--no-recursive':
        options.recursive = false;
        break;
      case '--dry-run':
        options.dryRun = true;
        break;
      case '--rule': {
        const pattern = requireValue(rest, ++i, arg);
        const destination = requireValue(rest, ++i, arg);
        options.rules.push({ pattern, destination });
        break;
      }
      case '--temp':
        options.temp = true;
        break;
      case '--old':
        options.oldDays = Number(requireValue(rest, ++i, arg));
        break;
      case '--json':
        options.json = true;
        break;
      case '--human':
        options.humanReadable = true;
        break;
      case '--raw':
        options.humanReadable = false;
        break;
      case '-o':
      case '--output':
        options.output = requireValue(rest, ++i, arg);
        break;
      case '--count':
        options.count = parseCount(requireValue(rest, ++i, arg), arg);
        break;
      case '--all':
        options.count = 'all';
        break;
      case '--limit':
        options.limit = parseCount(requireValue(rest, ++i, arg), arg, true);
        break;
      default:
        if (arg.startsWith('-') && arg.length > 1) {
          throw new InvalidArgumentError(`Unknown argument: ${arg}`);
        }
        options.args.push(arg);
    }
  }

  return options;
}

function positional(options: CliOptions, index: number, name: string): string {
  const value = options.args[index];
  if (value === undefined) {
    throw new InvalidArgumentError(`${options.command} needs ${name}`);
  }
  return value;
}

function formatValue(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return YAML.dump(value, { indent: 2 }).trimEnd();
  }
  return String(value);
}

/**
 * Load configuration in order: defaults, file, environment, flags.
 */
export function loadCliConfig(options: CliOptions, env: NodeJS.ProcessEnv): {
  manager: ConfigManager;
  config: OrganizerConfig;
} {
  const manager = new ConfigManager(resolveConfigPath(options.configPath ?? env.FILE_ORGANIZER_CONFIG));
  let config = applyEnvironment(manager.getAll(), env);
  if (options.dbPath) {
    config = { ...config, database: { ...config.database, path: resolve(options.dbPath) } };
  }
  return { manager, config };
}

function runConfigCommand(options: CliOptions, manager: ConfigManager, io: CliIO): number {
  const action = positional(options, 0, 'get, set or list');

  switch (action) {
    case 'list':
      io.print(manager.toYAML().trimEnd());
      return 0;
    case 'get': {
      const key = positional(options, 1, 'a KEY');
      const value = manager.get(key);
      if (value === undefined) {
        throw new NotFoundError(`Unknown configuration key: ${key}`, { key });
      }
      io.print(formatValue(value));
      return 0;
    }
    case 'set': {
      const key = positional(options, 1, 'a KEY');
      const raw = positional(options, 2, 'a VALUE');
      manager.set(key, YAML.load(raw));
      manager.save();
      io.print(`${key} = ${formatValue(manager.get(key))}`);
      return 0;
    }
    default:
      throw new InvalidArgumentError(`Unknown config action: ${action}`);
  }
}

async function confirmed(options: CliOptions, config: OrganizerConfig, io: CliIO, message: string): Promise<boolean> {
  if (options.dryRun || options.yes || !config.confirmActions) return true;
  if (await io.confirm(message)) return true;
  io.print('Cancelled.');
  return false;
}

/**
 * Write `content` to `output` when given, otherwise print it.
 */
function emit(io: CliIO, output: string | undefined, label: string, content: string): void {
  if (output) {
    writeFileSync(output, content + '\n');
    io.print(`${label} written to ${output}`);
  } else {
    io.print(content);
  }
}

function printGroups(io: CliIO, groups: Map<string, string[]>, dryRun: boolean): void {
  if (dryRun) io.print('Dry run: no files were changed.');
  if (groups.size === 0) {
    io.print('No matching files.');
    return;
  }
  for (const [label, paths] of groups) {
    io.print(`${label} (${paths.length})`);
    for (const path of paths) io.print(`  ${path}`);
  }
}

async function runManagerCommand(
  options: CliOptions,
  config: OrganizerConfig,
  manager: FileManager,
  io: CliIO
): Promise<number> {
  const batch = { recursive: options.recursive, dryRun: options.dryRun };

  switch (options.command) {
    case 'sort': {
      const directory = positional(options, 0, 'a DIRECTORY');
      const dimension = options.by ?? config.defaultSortDimension;
      if (!(await confirmed(options, config, io, `Sort files in ${directory} by ${dimension}?`))) return 0;
      printGroups(io, manager.sort(directory, dimension, batch), options.dryRun);
      return 0;
    }

    case 'rename': {
      const directory = positional(options, 0, 'a DIRECTORY');
      const pattern = positional(options, 1, 'a PATTERN');
      const replacement = positional(options, 2, 'a REPLACEMENT');
      if (!(await confirmed(options, config, io, `Rename files in ${directory}?`))) return 0;

      const renames = manager.renameBatch(directory, pattern, replacement, batch);
      if (options.dryRun) io.print('Dry run: no files were changed.');
      if (renames.size === 0) io.print('No matching files.');
      for (const [from, to] of renames) io.print(`${from} -> ${to}`);
      return 0;
    }

    case 'move': {
      if (options.rules.length === 0) {
        const source = positional(options, 0, 'a SOURCE');
        const destination = positional(options, 1, 'a DESTINATION');
        if (!(await confirmed(options, config, io, `Move ${source} to ${destination}?`))) return 0;
        const finalPath = manager.moveFile(source, destination, { dryRun: options.dryRun });
        io.print(options.dryRun ? `Would move ${source} -> ${finalPath}` : `Moved ${source} -> ${finalPath}`);
        return 0;
      }

      const directory = positional(options, 0, 'a DIRECTORY');
      if (!(await confirmed(options, config, io, `Move files in ${directory} by ${options.rules.length} rule(s)?`))) {
        return 0;
      }
      printGroups(io, manager.moveByRules(directory, options.rules, batch), options.dryRun);
      return 0;
    }

    case 'duplicates': {
      if (options.args.length === 0) positional(options, 0, 'at least one DIRECTORY');
      const groups = manager.findDuplicates(options.args);
      if (options.json) {
        emit(io, options.output, 'Duplicates', JSON.stringify(Object.fromEntries(groups), null, 2));
        return 0;
      }

      const lines = [`Found ${groups.size} duplicate group(s)`];
      for (const [fingerprint, paths] of groups) {
        lines.push(`${fingerprint.slice(0, 12)} (${paths.length} files)`);
        for (const path of paths) lines.push(`  ${path}`);
      }
      emit(io, options.output, 'Duplicates', lines.join('\n'));
      return 0;
    }

    case 'clean': {
      const directory = positional(options, 0, 'a DIRECTORY');
      if (options.temp === (options.oldDays !== undefined)) {
        throw new InvalidArgumentError('clean needs exactly one of --temp or --old DAYS');
      }
      const what = options.temp ? 'temporary files' : `files older than ${options.oldDays} day(s)`;
      if (!(await confirmed(options, config, io, `Delete ${what} in ${directory}? Deletions cannot be undone.`))) {
        return 0;
      }

      const paths = options.oldDays === undefined
        ? manager.cleanTempFiles(directory, batch)
        : manager.cleanOldFiles(directory, options.oldDays, batch);
      for (const path of paths) io.print(`  ${path}`);
      io.print(`${options.dryRun ? 'Would delete' : 'Deleted'} ${paths.length} file(s)`);
      return 0;
    }

    case 'report': {
      const directory = positional(options, 0, 'a DIRECTORY');
      const report = manager.generateReport(directory, {
        recursive: options.recursive,
        format: options.json ? 'json' : 'text',
        humanReadable: options.humanReadable,
      });
      emit(io, options.output, 'Report', report);
      return 0;
    }

    case 'history': {
      const limit = options.limit ?? (config.maxUndoHistory > 0 ? config.maxUndoHistory : undefined);
      const entries = manager.getActionHistory(limit === 0 ? undefined : limit);
      if (entries.length === 0) {
        io.print('No actions recorded.');
        return 0;
      }
      for (const entry of entries) {
        const target = entry.destination === null ? '' : ` -> ${entry.destination}`;
        io.print(`#${entry.id} ${entry.createdAt.toISOString()} ${entry.kind} ${entry.source}${target}`);
      }
      return 0;
    }

    case 'undo': {
      const count = options.count ?? 1;
      if (!(await confirmed(options, config, io, `Undo ${count === 'all' ? 'all' : count} action(s)?`))) return 0;

      const result = manager.undo(count);
      if (result.outcomes.length === 0) io.print('Nothing to undo.');
      for (const { entry, status, reason } of result.outcomes) {
        io.print(`${status}: ${entry.kind} ${entry.source}${reason ? ` (${reason})` : ''}`);
      }
      return result.success ? 0 : 1;
    }

    case 'config':
      throw new InvalidArgumentError('config is handled without a file manager');
  }
}

/**
 * Run one command and return the process exit code: 0 on success, 1 for a
 * known failure, 2 for anything unexpected.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
    io.print(USAGE);
    return argv.length === 0 ? 1 : 0;
  }

  try {
    const options = parseArgs(argv);
    const { manager: configManager, config } = loadCliConfig(options, io.env);

    Logger.configure({
      level: options.verbose ? 'debug' : config.logging.level,
      file: config.logging.file,
      useColors: config.logging.useColors,
    });

    if (options.command === 'config') {
      return runConfigCommand(options, configManager, io);
    }

    const manager = new FileManager({ config });
    try {
      return await runManagerCommand(options, config, manager, io);
    } finally {
      manager.close();
    }
  } catch (error) {
    if (error instanceof AppError) {
      logger.error(error.message, undefined, error.context);
      return 1;
    }
    handleError(error, 'cli');
    return 2;
  }
}

async function confirm(message: string): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(`${message} (y/N) `, (answer) => {
      rl.close();
      resolve(answer.trim().toLowerCase() === 'y');
    });
  });
}

async function main(): Promise<void> {
  loadEnv({ override: false });
  process.exitCode = await runCli(process.argv.slice(2), {
    print: line => console.log(line),
    confirm,
    env: process.env,
  });
}

const currentScriptPath = fileURLToPath(import.meta.url);
const invokedScriptPath = process.argv[1] ? resolve(process.argv[1]) : '';

if (invokedScriptPath && currentScriptPath === invokedScriptPath) {
  main().catch(error => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 2;
  });
}
