import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import {
  getConfig,
  initializeConfig,
  loadConfig,
  resetConfig,
  validateConfig,
} from '../../../src/config/loader.js';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { ConfigError } from '../../../src/api/errors.js';

describe('Config Loader', () => {
  let testConfigDir: string;

  const writeConfig = (name: string, content: unknown): string => {
    const path = join(testConfigDir, name);
    writeFileSync(path, typeof content === 'string' ? content : yaml.dump(content));
    return path;
  };

  beforeEach(() => {
    testConfigDir = mkdtempSync(join(tmpdir(), 'ab-volcano-config-'));
    resetConfig();
  });

  afterEach(() => {
    rmSync(testConfigDir, { recursive: true, force: true });
    resetConfig();
  });

  describe('loadConfig', () => {
    it('loads the packaged configuration with environment overrides', () => {
      const config = loadConfig(undefined, 'test');

      expect(config.permutation_test).toEqual({ exact_threshold: 100000, resample_rate: null, seed: 42 });
      expect(config.logging.level).toBe('silent');
      expect(config.reduction.ask_first).toEqual(['performance_test', 'instance', 'guest_kernel', 'host_kernel']);
    });

    it('matches the built-in defaults in production', () => {
      expect(loadConfig(undefined, 'production')).toEqual(DEFAULT_CONFIG);
    });

    it('deep-merges environment sections over the base values', () => {
      const path = writeConfig('merge.yaml', {
        ...DEFAULT_CONFIG,
        environments: {
          development: { permutation_test: { resample_rate: 9999 }, reduction: { ask_first: ['instance'] } },
        },
      });

      const config = loadConfig(path, 'development');

      expect(config.permutation_test).toEqual({ exact_threshold: 100000, resample_rate: 9999, seed: null });
      expect(config.reduction.ask_first).toEqual(['instance']);
      expect(config.logging.level).toBe('warn');
    });

    it('throws ConfigError for a missing file', () => {
      const path = join(testConfigDir, 'absent.yaml');

      expect(() => loadConfig(path)).toThrow(ConfigError);
      expect(() => loadConfig(path)).toThrow(`Configuration file not found: ${path}`);
    });

    it('throws ConfigError for a document that is not a mapping', () => {
      const path = writeConfig('list.yaml', '- a\n- b\n');

      expect(() => loadConfig(path)).toThrow(`Configuration file ${path} must contain a YAML mapping`);
    });

    it('throws ConfigError for unparseable YAML', () => {
      const path = writeConfig('broken.yaml', 'permutation_test: [unclosed\n');

      expect(() => loadConfig(path)).toThrow(/^Failed to load configuration: /);
    });
  });

  describe('validateConfig', () => {
    it('accepts the defaults', () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG);
    });

    it('lists every invalid field', () => {
      const invalid = {
        ...DEFAULT_CONFIG,
        permutation_test: { exact_threshold: 0, resample_rate: null, seed: null },
        reduction: { ask_first: ['instance', 'instance'] },
      };

      expect(() => validateConfig(invalid)).toThrow(
        'Configuration validation failed:\n' +
          'permutation_test.exact_threshold Must be a positive integer\n' +
          'reduction.ask_first must not list a dimension twice'
      );
    });

    it('rejects unknown log levels', () => {
      expect(() => validateConfig({ ...DEFAULT_CONFIG, logging: { level: 'verbose' } })).toThrow(
        'logging.level Level must be one of: fatal, error, warn, info, debug, trace, silent'
      );
    });
  });

  describe('global configuration', () => {
    it('initializes once and can be reset', () => {
      const path = writeConfig('global.yaml', { ...DEFAULT_CONFIG, ingest: { skip_invalid_records: true } });

      const initialized = initializeConfig(path);

      expect(getConfig()).toBe(initialized);
      expect(getConfig().ingest.skip_invalid_records).toBe(true);

      resetConfig();
      expect(getConfig()).not.toBe(initialized);
    });
  });
});
