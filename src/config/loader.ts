/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from '../api/errors.js';
import { LogLevelSchema } from '../types/schemas/common.js';
import { SimulatorConfigSchema } from '../types/schemas/config.js';

/**
 * Configuration Schema (matches simulator.yaml structure)
 */
export type SimulatorConfig = z.infer<typeof SimulatorConfigSchema>;

export type Environment = 'production' | 'development' | 'test';

type ConfigRecord = Record<string, unknown>;

const ConfigFileSchema = z
  .object({
    environments: z
      .object({
        production: z.record(z.unknown()).optional(),
        development: z.record(z.unknown()).optional(),
        test: z.record(z.unknown()).optional(),
      })
      .optional(),
  })
  .passthrough();

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects (arrays and scalars in `source` replace)
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const output: ConfigRecord = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
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

/**
 * Path of a file under the package's config/ directory
 */
export function packageConfigPath(fileName: string): string {
  return join(findPackageRoot(), 'config', fileName);
}

function readYaml(path: string): unknown {
  try {
    return yaml.load(readFileSync(path, 'utf8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${path}`, { path });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to load configuration: ${reason}`, { path });
  }
}

/**
 * Validate configuration values
 *
 * @throws ConfigurationError listing every failing field
 */
export function validateConfig(config: unknown): SimulatorConfig {
  const parseResult = SimulatorConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new ConfigurationError(`Configuration validation failed:\n${errors.join('\n')}`, {
      issues: errors,
    });
  }

  return parseResult.data;
}

/**
 * Load and validate configuration from a YAML file
 *
 * `environments.<env>` is deep-merged over the base document, with `env`
 * taken from the argument, then NODE_ENV, then 'development'.
 * SCHED_SIM_LOG_LEVEL overrides `logging.level`.
 */
export function loadConfig(configPath?: string, environment?: Environment): SimulatorConfig {
  const finalPath = configPath ?? packageConfigPath('simulator.yaml');

  const fileResult = ConfigFileSchema.safeParse(readYaml(finalPath));
  if (!fileResult.success) {
    throw new ConfigurationError(`Configuration file must be a YAML mapping: ${finalPath}`, {
      path: finalPath,
    });
  }

  const { environments, ...baseConfig } = fileResult.data;
  const env = environment ?? process.env.NODE_ENV ?? 'development';
  const envConfig =
    env === 'production'
      ? environments?.production
      : env === 'test'
        ? environments?.test
        : environments?.development;

  let merged: ConfigRecord = envConfig ? deepMerge(baseConfig, envConfig) : baseConfig;

  const levelOverride = LogLevelSchema.safeParse(process.env.SCHED_SIM_LOG_LEVEL?.toLowerCase());
  if (levelOverride.success) {
    merged = deepMerge(merged, { logging: { level: levelOverride.data } });
  }

  return validateConfig(merged);
}

/**
 * Global configuration instance
 */
let globalConfig: SimulatorConfig | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: Environment): SimulatorConfig {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): SimulatorConfig {
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
