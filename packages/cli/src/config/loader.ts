/**
 * @xsql/cli - Configuration Loader
 *
 * Discovers and validates `.xsqlrc.json` configuration files.
 *
 * @module @xsql/cli/config
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { XsqlError } from '@xsql/core';
import { cliConfigSchema, type CliConfig, type DisplayMode } from './types.js';

export const CONFIG_FILE = '.xsqlrc.json';

/**
 * Find a configuration file in the given directory or its parents
 *
 * @param startDir - Directory to start searching from
 * @returns Path to config file, or null if not found
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const configPath = path.join(currentDir, CONFIG_FILE);
    if (fs.existsSync(configPath)) {
      return configPath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached root
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

/**
 * Parse and validate configuration values
 *
 * @throws {XsqlError} XSQL_C700 listing every invalid field
 */
export function parseConfig(raw: unknown, source = CONFIG_FILE): CliConfig {
  const parsed = cliConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new XsqlError({
      code: 'XSQL_C700',
      message: `Invalid configuration in ${source}: ${issues.join('; ')}`,
      context: { source, issues },
    });
  }
  return parsed.data;
}

/**
 * Load configuration from a file. An `input` path in the file is resolved
 * against the file's directory.
 *
 * @throws {XsqlError} XSQL_C700 when the file is unreadable, not JSON or invalid
 */
export async function loadConfig(configPath: string): Promise<CliConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.promises.readFile(configPath, 'utf-8'));
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new XsqlError({
      code: 'XSQL_C700',
      message: `Failed to load config from ${configPath}: ${cause.message}`,
      context: { source: configPath },
      cause,
    });
  }
  const config = parseConfig(raw, configPath);
  return config.input === undefined
    ? config
    : { ...config, input: path.resolve(path.dirname(configPath), config.input) };
}

/**
 * Load the nearest `.xsqlrc.json`, or the defaults when there is none
 */
export async function loadProjectConfig(cwd: string = process.cwd()): Promise<CliConfig> {
  const configPath = findConfigFile(cwd);
  if (!configPath) {
    return parseConfig({});
  }

  return loadConfig(configPath);
}

/** Values given on the command line */
export interface ConfigOverrides {
  readonly input?: string;
  readonly mode?: DisplayMode;
  readonly maxRows?: number;
  readonly verbose?: boolean;
}

/**
 * Lay command-line flags over file configuration
 */
export function mergeConfig(config: CliConfig, overrides: ConfigOverrides): CliConfig {
  return {
    ...config,
    input: overrides.input ?? config.input,
    mode: overrides.mode ?? config.mode,
    engine: {
      ...config.engine,
      maxRows: overrides.maxRows ?? config.engine.maxRows,
      logger: overrides.verbose ? { level: 'debug', json: true } : config.engine.logger,
    },
  };
}
