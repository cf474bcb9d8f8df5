/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { homedir } from 'os';
import YAML from 'js-yaml';
import { Logger, LogLevel, isLogLevel } from './logger.js';
import { InvalidArgumentError, errorMessage } from './errors.js';
import { DIMENSIONS, Dimension } from './types.js';

const logger = new Logger({ context: 'ConfigManager' });

export interface DatabaseConfig {
  path: string;
}

export interface LoggingConfig {
  level: LogLevel;
  file: string | null;
  useColors: boolean;
}

export interface IndexConfig {
  reuseFingerprints: boolean;
}

export interface OrganizerConfig {
  typeExtensions: Record<string, string[]>;
  /** Exclusive upper bound in bytes; `null` is unbounded. */
  sizeThresholds: Record<string, number | null>;
  database: DatabaseConfig;
  logging: LoggingConfig;
  index: IndexConfig;
  defaultSortDimension: Dimension;
  confirmActions: boolean;
  maxUndoHistory: number;
}

const MiB = 1024 * 1024;

export const DEFAULT_DATA_DIR = join(homedir(), '.local', 'share', 'file-organizer');
export const DEFAULT_CONFIG_PATH = join(homedir(), '.config', 'file-organizer', 'config.yaml');

export const DEFAULT_CONFIG: OrganizerConfig = {
  typeExtensions: {
    images: ['.jpg', '.jpeg', '.png', '.gif', '.bmp', '.tiff', '.webp'],
    documents: ['.pdf', '.doc', '.docx', '.xls', '.xlsx', '.ppt', '.pptx', '.txt', '.md', '.odt', '.csv', '.log'],
    videos: ['.mp4', '.avi', '.mkv', '.mov', '.wmv', '.flv', '.webm'],
    audio: ['.mp3', '.wav', '.flac', '.ogg', '.aac', '.m4a'],
    archives: ['.zip', '.tar', '.gz', '.rar', '.7z'],
    code: ['.py', '.js', '.ts', '.html', '.css', '.java', '.c', '.cpp', '.h', '.php', '.rb']
  },
  sizeThresholds: {
    tiny: MiB,
    small: 10 * MiB,
    medium: 100 * MiB,
    large: 1024 * MiB,
    huge: null
  },
  database: {
    path: join(DEFAULT_DATA_DIR, 'organizer.db')
  },
  logging: {
    level: 'info',
    file: null,
    useColors: true
  },
  index: {
    reuseFingerprints: false
  },
  defaultSortDimension: 'type',
  confirmActions: true,
  maxUndoHistory: 50
};

function cloneConfig(config: OrganizerConfig): OrganizerConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge a parsed user document over a base configuration, narrowing every
 * field. Invalid fields keep the base value and are reported in `errors`.
 */
export function mergeConfig(
  base: OrganizerConfig,
  user: unknown
): { config: OrganizerConfig; errors: string[] } {
  const config = cloneConfig(base);
  const errors: string[] = [];

  if (user === null || user === undefined) return { config, errors };
  if (!isRecord(user)) {
    return { config, errors: ['Configuration root must be a mapping'] };
  }

  const { typeExtensions, sizeThresholds, database, logging, index } = user;

  if (typeExtensions !== undefined) {
    if (!isRecord(typeExtensions)) {
      errors.push('typeExtensions must map type labels to extension lists');
    } else {
      const table: Record<string, string[]> = { ...config.typeExtensions };
      for (const [label, extensions] of Object.entries(typeExtensions)) {
        if (!Array.isArray(extensions) || !extensions.every(ext => typeof ext === 'string')) {
          errors.push(`typeExtensions.${label} must be a list of extensions`);
          continue;
        }
        table[label] = extensions.map(ext => {
          const lower = String(ext).trim().toLowerCase();
          return lower.startsWith('.') ? lower : `.${lower}`;
        });
      }
      config.typeExtensions = table;
    }
  }

  if (sizeThresholds !== undefined) {
    if (!isRecord(sizeThresholds)) {
      errors.push('sizeThresholds must map size labels to byte bounds');
    } else {
      const thresholds: Record<string, number | null> = {};
      for (const [label, bound] of Object.entries(sizeThresholds)) {
        if (bound === null || bound === Infinity) {
          thresholds[label] = null;
        } else if (typeof bound === 'number' && Number.isFinite(bound) && bound > 0) {
          thresholds[label] = bound;
        } else {
          errors.push(`sizeThresholds.${label} must be a positive number or null`);
        }
      }
      if (Object.keys(thresholds).length === 0) {
        errors.push('sizeThresholds must define at least one category');
      } else {
        config.sizeThresholds = thresholds;
      }
    }
  }

  if (database !== undefined) {
    if (isRecord(database) && typeof database.path === 'string' && database.path.trim()) {
      config.database.path = database.path.trim();
    } else {
      errors.push('database.path must be a non-empty string');
    }
  }

  if (logging !== undefined) {
    if (!isRecord(logging)) {
      errors.push('logging must be a mapping');
    } else {
      const level = typeof logging.level === 'string' ? logging.level.toLowerCase() : logging.level;
      if (level !== undefined) {
        if (isLogLevel(level)) config.logging.level = level;
        else errors.push('logging.level must be one of debug, info, warn, error');
      }
      if (logging.file !== undefined) {
        if (logging.file === null || typeof logging.file === 'string') {
          config.logging.file = logging.file || null;
        } else {
          errors.push('logging.file must be a path or null');
        }
      }
      if (logging.useColors !== undefined) {
        if (typeof logging.useColors === 'boolean') config.logging.useColors = logging.useColors;
        else errors.push('logging.useColors must be a boolean');
      }
    }
  }

  if (index !== undefined) {
    if (isRecord(index) && typeof index.reuseFingerprints === 'boolean') {
      config.index.reuseFingerprints = index.reuseFingerprints;
    } else {
      errors.push('index.reuseFingerprints must be a boolean');
    }
  }

  if (user.defaultSortDimension !== undefined) {
    const dimension = user.defaultSortDimension;
    const match = DIMENSIONS.find(candidate => candidate === dimension);
    if (match) config.defaultSortDimension = match;
    else errors.push('defaultSortDimension must be one of type, size, date');
  }

  if (user.confirmActions !== undefined) {
    if (typeof user.confirmActions === 'boolean') config.confirmActions = user.confirmActions;
    else errors.push('confirmActions must be a boolean');
  }

  if (user.maxUndoHistory !== undefined) {
    const max = user.maxUndoHistory;
    if (typeof max === 'number' && Number.isInteger(max) && max >= 0) config.maxUndoHistory = max;
    else errors.push('maxUndoHistory must be a non-negative integer');
  }

  return { config, errors };
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: OrganizerConfig;
  private configPath: string;
  private isDirty = false;

  constructor(configPath: string = DEFAULT_CONFIG_PATH) {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): OrganizerConfig {
    if (!existsSync(this.configPath)) {
      logger.debug(
        `Config file not found: ${this.configPath}, using defaults`,
        { path: this.configPath }
      );
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let parsed: unknown;

      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      const { config, errors } = mergeConfig(DEFAULT_CONFIG, parsed);
      for (const problem of errors) {
        logger.warn(`Ignoring invalid setting: ${problem}`, { path: this.configPath });
      }

      logger.debug(`Loaded configuration from ${this.configPath}`);
      return config;
    } catch (error) {
      logger.warn(`Failed to load config: ${errorMessage(error)}`, { path: this.configPath });
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  /**
   * Get complete configuration
   */
  getAll(): OrganizerConfig {
    return cloneConfig(this.config);
  }

  /**
   * Get nested configuration value
   */
  get(path: string): unknown {
    let value: unknown = this.config;

    for (const part of path.split('.')) {
      if (!isRecord(value)) return undefined;
      value = value[part];
    }

    return value;
  }

  /**
   * Set configuration value. The result must still be a valid configuration.
   */
  set(path: string, value: unknown): void {
    const parts = path.split('.').filter(Boolean);
    const lastKey = parts.pop();
    if (!lastKey) {
      throw new InvalidArgumentError('Configuration key must not be empty');
    }

    const draft: Record<string, unknown> = JSON.parse(JSON.stringify(this.config));
    let obj = draft;
    for (const part of parts) {
      const next = obj[part];
      if (!isRecord(next)) {
        throw new InvalidArgumentError(`Unknown configuration section: ${part}`, { key: path });
      }
      obj = next;
    }
    const openSection = parts[0] === 'typeExtensions' || parts[0] === 'sizeThresholds';
    if (!(lastKey in obj) && !openSection) {
      throw new InvalidArgumentError(`Unknown configuration key: ${path}`, { key: path });
    }
    obj[lastKey] = value;

    const { config, errors } = mergeConfig(this.config, draft);
    if (errors.length > 0) {
      throw new InvalidArgumentError(`Invalid value for ${path}: ${errors.join('; ')}`, { key: path });
    }

    this.config = config;
    this.isDirty = true;

    logger.debug(`Config updated: ${path}`, { value });
  }

  /**
   * Save configuration to file
   */
  save(): void {
    if (!this.isDirty) return;

    mkdirSync(dirname(this.configPath), { recursive: true });
    const content = this.configPath.endsWith('.json') ? this.toJSON() : this.toYAML();

    writeFileSync(this.configPath, content);
    this.isDirty = false;

    logger.info(`Configuration saved to ${this.configPath}`);
  }

  /**
   * Reset to defaults
   */
  reset(): void {
    this.config = cloneConfig(DEFAULT_CONFIG);
    this.isDirty = true;
    logger.info('Configuration reset to defaults');
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const { errors } = mergeConfig(DEFAULT_CONFIG, JSON.parse(this.toJSON()));

    const bounds = Object.values(this.config.sizeThresholds);
    if (bounds.filter(bound => bound === null).length > 1) {
      errors.push('Only one size category may be unbounded');
    }

    const seen = new Map<string, string>();
    for (const [label, extensions] of Object.entries(this.config.typeExtensions)) {
      for (const ext of extensions) {
        const owner = seen.get(ext);
        if (owner && owner !== label) {
          errors.push(`Extension ${ext} is listed under both ${owner} and ${label}`);
        }
        seen.set(ext, label);
      }
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Export configuration as JSON
   */
  toJSON(): string {
    return JSON.stringify(this.config, null, 2);
  }

  /**
   * Export configuration as YAML
   */
  toYAML(): string {
    return YAML.dump(this.config, { indent: 2 });
  }

  /**
   * Get config file path
   */
  getPath(): string {
    return this.configPath;
  }
}

/**
 * Resolve which configuration file to load.
 */
export function resolveConfigPath(overridePath?: string): string {
  if (overridePath?.trim()) return overridePath.trim();
  const configured = process.env.FILE_ORGANIZER_CONFIG?.trim();
  return configured || DEFAULT_CONFIG_PATH;
}

/**
 * Apply environment overrides (DB_PATH) on top of a loaded configuration.
 */
export function applyEnvironment(config: OrganizerConfig, env: NodeJS.ProcessEnv = process.env): OrganizerConfig {
  const dbPath = env.DB_PATH?.trim();
  if (!dbPath) return config;
  return { ...config, database: { ...config.database, path: dbPath } };
}
