/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { ConfigError } from '../api/errors.js';
import { VolcanoConfigSchema, type VolcanoConfig } from '../types/schemas/config.js';
import { DEFAULT_CONFIG } from './defaults.js';

export type Environment = 'production' | 'development' | 'test';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects; arrays and scalars from `source` replace those in `target`
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'volcano.yaml');
}

function resolveEnvironment(environment?: Environment): Environment {
  if (environment) {
    return environment;
  }
  const env = process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Load configuration from YAML file
 *
 * Without an explicit path the packaged config/volcano.yaml is used, and
 * the built-in defaults if the package ships none.
 */
export function loadConfig(configPath?: string, environment?: Environment): VolcanoConfig {
  const finalPath = configPath ?? defaultConfigPath();

  if (!configPath && !existsSync(finalPath)) {
    return DEFAULT_CONFIG;
  }

  let document: unknown;
  try {
    document = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${finalPath}`, { path: finalPath });
    }
    throw new ConfigError(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`, {
      path: finalPath,
    });
  }

  if (!isPlainObject(document)) {
    throw new ConfigError(`Configuration file ${finalPath} must contain a YAML mapping`, { path: finalPath });
  }

  const { environments, ...base } = document;
  let merged: PlainObject = base;
  if (isPlainObject(environments)) {
    const envConfig = environments[resolveEnvironment(environment)];
    if (isPlainObject(envConfig)) {
      merged = deepMerge(base, envConfig);
    }
  }

  return validateConfig(merged);
}

/**
 * Validate configuration values
 */
export function validateConfig(config: unknown): VolcanoConfig {
  const parseResult = VolcanoConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new ConfigError(`Configuration validation failed:\n${errors.join('\n')}`, { issues: errors });
  }
  return parseResult.data;
}

/**
 * Global configuration instance
 */
let globalConfig: VolcanoConfig | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: Environment): VolcanoConfig {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): VolcanoConfig {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}
