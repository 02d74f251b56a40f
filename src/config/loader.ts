/**
 * Loads configuration from file and environment.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { safeExistsSync, safeReadFile } from '../utils/safe-fs.js';
import { DEFAULT_CONFIG_FILE } from './defaults.js';
import { mergeConfig, readEnvOverrides, type EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import type { Config, PartialConfig } from './types.js';

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /** Explicit configuration file. It must exist. */
  path?: string | undefined;
  /** Directory searched for glbindgen.toml when no path is given. */
  cwd?: string | undefined;
  /** Environment for GLBINDGEN_* overrides (defaults to process.env). */
  env?: EnvRecord | undefined;
}

/**
 * Reads glbindgen.toml (when present) and applies environment overrides.
 *
 * Relative registry and output paths in the file are resolved against the
 * file's directory, those from the environment against `cwd`.
 *
 * @throws ConfigParseError if an explicit file is missing or any file is invalid.
 * @throws EnvCoercionError if an environment value cannot be coerced.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const cwd = options.cwd ?? process.cwd();
  const filePath = options.path ?? path.join(cwd, DEFAULT_CONFIG_FILE);
  let config: Config;

  if (safeExistsSync(filePath)) {
    config = resolveRelativePaths(parseConfig(await safeReadFile(filePath)), path.dirname(filePath));
  } else if (options.path !== undefined) {
    throw new ConfigParseError(`Configuration file '${options.path}' does not exist`);
  } else {
    config = getDefaultConfig();
  }

  const { overrides } = readEnvOverrides(options.env ?? process.env);
  return mergeConfig(config, resolveOverridePaths(overrides, cwd));
}

function resolveAgainst(baseDir: string, target: string | undefined): string | undefined {
  return target === undefined ? undefined : path.resolve(baseDir, target);
}

function resolveRelativePaths(config: Config, baseDir: string): Config {
  return {
    ...config,
    registry: { ...config.registry, path: resolveAgainst(baseDir, config.registry.path) },
    output: { ...config.output, path: resolveAgainst(baseDir, config.output.path) },
  };
}

function resolveOverridePaths(overrides: PartialConfig, baseDir: string): PartialConfig {
  const registryPath = overrides.registry?.path;
  const outputPath = overrides.output?.path;
  return {
    ...overrides,
    ...(registryPath === undefined
      ? {}
      : { registry: { ...overrides.registry, path: path.resolve(baseDir, registryPath) } }),
    ...(outputPath === undefined
      ? {}
      : { output: { ...overrides.output, path: path.resolve(baseDir, outputPath) } }),
  };
}
