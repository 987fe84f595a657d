/**
 * Loads the effective configuration from triz.toml and the environment.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { isErrnoCode, safeReadFile } from '../utils/safe-fs.js';
import { DEFAULT_CONFIG_FILE } from './defaults.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import type { Config } from './types.js';
import { assertConfigValid } from './validator.js';

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /**
   * Explicit config file. A missing explicit file is an error; a missing
   * triz.toml in `cwd` is not.
   */
  readonly configPath?: string;
  /** Directory searched for triz.toml and against which relative paths resolve. */
  readonly cwd?: string;
  /** Environment to read overrides from. */
  readonly env?: EnvRecord;
}

/**
 * Reads, merges and validates configuration.
 *
 * Relative `paths.*` values are resolved against `cwd`.
 *
 * @throws ConfigParseError if the file is unreadable or malformed.
 * @throws EnvCoercionError if an environment override cannot be coerced.
 * @throws ConfigValidationError if the merged values are out of range.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.configPath !== undefined;
  const filePath = path.resolve(cwd, options.configPath ?? DEFAULT_CONFIG_FILE);

  let fileConfig: Config;
  try {
    fileConfig = parseConfig(await safeReadFile(filePath));
  } catch (error) {
    if (!explicit && isErrnoCode(error, 'ENOENT')) {
      fileConfig = getDefaultConfig();
    } else if (error instanceof ConfigParseError) {
      throw error;
    } else {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ConfigParseError(`Cannot read config file '${filePath}': ${cause.message}`, cause);
    }
  }

  const config = applyEnvOverrides(fileConfig, options.env ?? process.env);
  assertConfigValid(config);

  return {
    ...config,
    paths: {
      sessions: path.resolve(cwd, config.paths.sessions),
      catalog: config.paths.catalog === '' ? '' : path.resolve(cwd, config.paths.catalog),
    },
  };
}
