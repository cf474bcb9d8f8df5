import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  ConfigManager,
  DEFAULT_CONFIG,
  applyEnvironment,
  mergeConfig,
  resolveConfigPath,
} from './config.js';
import { InvalidArgumentError } from './errors.js';

describe('ConfigManager', () => {
  let configDir: string;

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), 'organizer-config-'));
  });

  afterEach(() => {
    rmSync(configDir, { recursive: true, force: true });
  });

  describe('Initialization', () => {
    it('should load defaults if the file does not exist', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'));
      expect(manager.getAll()).toEqual(DEFAULT_CONFIG);
    });

    it('should hand out copies', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'));
      manager.getAll().typeExtensions.images.push('.heic');
      expect(manager.getAll().typeExtensions.images).not.toContain('.heic');
    });
  });

  describe('YAML Configuration', () => {
    it('should merge YAML settings over the defaults', () => {
      const yamlPath = join(configDir, 'config.yaml');
      writeFileSync(yamlPath, `
sizeThresholds:
  small: 1000
  big: null
logging:
  level: DEBUG
confirmActions: false
typeExtensions:
  notes: [NOTE, .jot]
`);

      const config = new ConfigManager(yamlPath).getAll();

      expect(config.sizeThresholds).toEqual({ small: 1000, big: null });
      expect(config.logging.level).toBe('debug');
      expect(config.confirmActions).toBe(false);
      expect(config.typeExtensions.notes).toEqual(['.note', '.jot']);
      expect(config.typeExtensions.images).toEqual(DEFAULT_CONFIG.typeExtensions.images);
    });

    it('should fall back to defaults for a malformed file', () => {
      const yamlPath = join(configDir, 'broken.yaml');
      writeFileSync(yamlPath, 'sizeThresholds: [1, 2');
      expect(new ConfigManager(yamlPath).getAll()).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('JSON Configuration', () => {
    it('should load JSON configuration', () => {
      const jsonPath = join(configDir, 'config.json');
      writeFileSync(jsonPath, JSON.stringify({ maxUndoHistory: 10, index: { reuseFingerprints: true } }));

      const manager = new ConfigManager(jsonPath);

      expect(manager.get('maxUndoHistory')).toBe(10);
      expect(manager.get('index.reuseFingerprints')).toBe(true);
    });

    it('should keep defaults for invalid values', () => {
      const jsonPath = join(configDir, 'config.json');
      writeFileSync(jsonPath, JSON.stringify({ maxUndoHistory: -1, defaultSortDimension: 'color' }));

      const config = new ConfigManager(jsonPath).getAll();

      expect(config.maxUndoHistory).toBe(50);
      expect(config.defaultSortDimension).toBe('type');
    });
  });

  describe('Get and Set', () => {
    it('should read nested values', () => {
      const manager = new ConfigManager(join(configDir, 'config.yaml'));
      expect(manager.get('logging.level')).toBe('info');
      expect(manager.get('logging.nothing.here')).toBeUndefined();
    });

    it('should set and persist a value', () => {
      const path = join(configDir, 'config.yaml');
      const manager = new ConfigManager(path);

      manager.set('confirmActions', false);
      manager.set('sizeThresholds.gigantic', 5000);
      manager.save();

      const reloaded = new ConfigManager(path);
      expect(reloaded.get('confirmActions')).toBe(false);
      expect(reloaded.get('sizeThresholds.gigantic')).toBe(5000);
    });

    it('should reject invalid values and unknown keys', () => {
      const manager = new ConfigManager(join(configDir, 'config.yaml'));

      expect(() => manager.set('maxUndoHistory', 'many')).toThrow(InvalidArgumentError);
      expect(() => manager.set('unknownKey', 1)).toThrow('Unknown configuration key: unknownKey');
      expect(manager.get('maxUndoHistory')).toBe(50);
    });

    it('should reset to defaults', () => {
      const manager = new ConfigManager(join(configDir, 'config.yaml'));
      manager.set('maxUndoHistory', 5);
      manager.reset();
      expect(manager.get('maxUndoHistory')).toBe(50);
    });
  });

  describe('Configuration Validation', () => {
    it('should accept the defaults', () => {
      const manager = new ConfigManager(join(configDir, 'config.yaml'));
      expect(manager.validate()).toEqual({ valid: true, errors: [] });
    });

    it('should report an extension owned by two types', () => {
      const manager = new ConfigManager(join(configDir, 'config.yaml'));
      manager.set('typeExtensions.pictures', ['.png']);

      const result = manager.validate();

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['Extension .png is listed under both images and pictures']);
    });

    it('should report more than one unbounded size category', () => {
      const manager = new ConfigManager(join(configDir, 'config.yaml'));
      manager.set('sizeThresholds.gigantic', null);
      expect(manager.validate().errors).toEqual(['Only one size category may be unbounded']);
    });
  });
});

describe('mergeConfig', () => {
  it('should reject a non-mapping root', () => {
    const { config, errors } = mergeConfig(DEFAULT_CONFIG, ['not', 'a', 'mapping']);
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(errors).toEqual(['Configuration root must be a mapping']);
  });

  it('should treat Infinity as unbounded', () => {
    const { config } = mergeConfig(DEFAULT_CONFIG, { sizeThresholds: { small: 10, rest: Infinity } });
    expect(config.sizeThresholds).toEqual({ small: 10, rest: null });
  });
});

describe('Environment', () => {
  it('should prefer an explicit config path', () => {
    expect(resolveConfigPath('  /etc/organizer.yaml ')).toBe('/etc/organizer.yaml');
  });

  it('should let DB_PATH override the database path', () => {
    const config = applyEnvironment(DEFAULT_CONFIG, { DB_PATH: '/var/lib/organizer.db' });
    expect(config.database.path).toBe('/var/lib/organizer.db');
    expect(applyEnvironment(DEFAULT_CONFIG, {})).toBe(DEFAULT_CONFIG);
  });
});
