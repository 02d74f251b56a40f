/**
 * Environment variable overrides for configuration.
 *
 * Every GLBINDGEN_* variable overrides one configuration field. Unset and
 * empty variables are ignored.
 *
 * Override precedence: command-line flags > env > config file > defaults
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvValueType = 'string' | 'boolean' | 'list';

/**
 * One supported environment variable.
 */
interface EnvVarSpec {
  readonly name: string;
  readonly type: EnvValueType;
  readonly description: string;
  /** Returns `overrides` with the variable's field set from its raw value. */
  readonly apply: (overrides: PartialConfig, raw: string) => PartialConfig;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts 'true', '1', 'yes', 'on' and 'false', '0', 'no', 'off', ignoring case.
 *
 * @throws EnvCoercionError if the value is none of these.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Splits a comma-separated list, dropping blank items.
 */
function coerceToList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

function stringVar(
  name: string,
  description: string,
  set: (overrides: PartialConfig, value: string) => PartialConfig
): EnvVarSpec {
  return { name, type: 'string', description, apply: (overrides, raw) => set(overrides, raw.trim()) };
}

function booleanVar(
  name: string,
  description: string,
  set: (overrides: PartialConfig, value: boolean) => PartialConfig
): EnvVarSpec {
  return {
    name,
    type: 'boolean',
    description,
    apply: (overrides, raw) => set(overrides, coerceToBoolean(raw, name)),
  };
}

/**
 * Supported environment variables.
 */
const ENV_VARS: readonly EnvVarSpec[] = [
  stringVar('GLBINDGEN_API', 'Namespace to generate (gl, gles1, gles2, glx, wgl, egl)', (o, v) => ({
    ...o,
    bindings: { ...o.bindings, api: v },
  })),
  stringVar('GLBINDGEN_PROFILE', 'Profile (core, compatibility)', (o, v) => ({
    ...o,
    bindings: { ...o.bindings, profile: v },
  })),
  stringVar('GLBINDGEN_VERSION', 'API version, e.g. 4.5', (o, v) => ({
    ...o,
    bindings: { ...o.bindings, version: v },
  })),
  stringVar(
    'GLBINDGEN_GENERATOR',
    'Binding style (global, struct, static_struct, static)',
    (o, v) => ({ ...o, bindings: { ...o.bindings, generator: v } })
  ),
  {
    name: 'GLBINDGEN_EXTENSIONS',
    type: 'list',
    description: 'Comma-separated extension names',
    apply: (o, raw) => ({ ...o, bindings: { ...o.bindings, extensions: coerceToList(raw) } }),
  },
  booleanVar('GLBINDGEN_FULL', 'Include every record of the registry (true/false)', (o, v) => ({
    ...o,
    bindings: { ...o.bindings, full: v },
  })),
  stringVar('GLBINDGEN_REGISTRY', 'Registry document path (.xml or .toml)', (o, v) => ({
    ...o,
    registry: { ...o.registry, path: v },
  })),
  stringVar('GLBINDGEN_OUTPUT', 'Output file path', (o, v) => ({
    ...o,
    output: { ...o.output, path: v },
  })),
  stringVar('GLBINDGEN_RUNTIME_MODULE', 'Module the generated code imports its runtime from', (o, v) => ({
    ...o,
    output: { ...o.output, runtime_module: v },
  })),
  booleanVar('GLBINDGEN_VERIFY', 'Parse emitted source before writing it (true/false)', (o, v) => ({
    ...o,
    output: { ...o.output, verify: v },
  })),
  stringVar(
    'GLBINDGEN_UNKNOWN_EXTENSIONS',
    'Unknown extension policy (ignore, warn, error)',
    (o, v) => ({ ...o, resolver: { ...o.resolver, unknown_extensions: v } })
  ),
  booleanVar('GLBINDGEN_DEBUG', 'Write debug log entries (true/false)', (o, v) => ({
    ...o,
    logging: { ...o.logging, debug: v },
  })),
];

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** Environment variables that were applied. */
  appliedVars: string[];
  /** Coercion errors, when collected. */
  errors: EnvCoercionError[];
}

/**
 * Reads GLBINDGEN_* variables into configuration overrides.
 *
 * @param env - The environment to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of
 *   throwing the first one.
 * @throws EnvCoercionError if a value cannot be coerced and errors are not collected.
 *
 * @example
 * ```typescript
 * const { overrides } = readEnvOverrides({ GLBINDGEN_API: 'egl', GLBINDGEN_VERSION: '1.5' });
 * console.log(overrides.bindings); // { api: 'egl', version: '1.5' }
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  let overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const spec of ENV_VARS) {
    const value = env[spec.name];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      overrides = spec.apply(overrides, value);
      appliedVars.push(spec.name);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration. Fields set in
 * `partial` win.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    bindings: { ...base.bindings, ...partial.bindings },
    registry: { ...base.registry, ...partial.registry },
    output: { ...base.output, ...partial.output },
    resolver: { ...base.resolver, ...partial.resolver },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration.
 * @param env - The environment to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return mergeConfig(config, overrides);
}

/**
 * Documentation for every supported environment variable.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const spec of ENV_VARS) {
    docs[spec.name] = { description: spec.description, type: spec.type };
  }
  return docs;
}
