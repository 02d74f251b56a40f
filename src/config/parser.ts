/**
 * TOML configuration parser for glbindgen.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import {
  DEFAULT_BINDINGS,
  DEFAULT_CONFIG,
  DEFAULT_LOGGING,
  DEFAULT_OUTPUT,
  DEFAULT_REGISTRY,
  DEFAULT_RESOLVER,
} from './defaults.js';
import type {
  BindingsConfig,
  Config,
  LoggingConfig,
  OutputConfig,
  RegistryConfig,
  ResolverConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a string.
 *
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is an array of strings.
 *
 * @throws ConfigParseError otherwise.
 */
function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected array of strings, got ${typeof value}`
    );
  }
  const items: readonly unknown[] = value;
  return items.map((item, index) => validateString(item, `${fieldPath}[${String(index)}]`));
}

/**
 * A version may be written as a TOML string or, for convenience, as a float
 * such as `4.5`.
 */
function validateVersion(value: unknown, fieldPath: string): string {
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0) {
    return Number.isInteger(value) ? `${String(value)}.0` : String(value);
  }
  return validateString(value, fieldPath);
}

function readSection(parsed: Section, name: string): Section | undefined {
  const value = parsed[name];
  if (value === undefined) {
    return undefined;
  }
  if (!isSection(value)) {
    throw new ConfigParseError(`Invalid type for '${name}': expected table, got ${typeof value}`);
  }
  return value;
}

function parseBindings(raw: Section | undefined): BindingsConfig {
  const result: BindingsConfig = { ...DEFAULT_BINDINGS, extensions: [...DEFAULT_BINDINGS.extensions] };
  if (raw === undefined) {
    return result;
  }

  if ('api' in raw) {
    result.api = validateString(raw.api, 'bindings.api');
  }
  if ('profile' in raw) {
    result.profile = validateString(raw.profile, 'bindings.profile');
  }
  if ('version' in raw) {
    result.version = validateVersion(raw.version, 'bindings.version');
  }
  if ('generator' in raw) {
    result.generator = validateString(raw.generator, 'bindings.generator');
  }
  if ('extensions' in raw) {
    result.extensions = validateStringArray(raw.extensions, 'bindings.extensions');
  }
  if ('full' in raw) {
    result.full = validateBoolean(raw.full, 'bindings.full');
  }

  return result;
}

function parseRegistry(raw: Section | undefined): RegistryConfig {
  const result: RegistryConfig = { ...DEFAULT_REGISTRY };
  if (raw !== undefined && 'path' in raw) {
    result.path = validateString(raw.path, 'registry.path');
  }
  return result;
}

function parseOutput(raw: Section | undefined): OutputConfig {
  const result: OutputConfig = { ...DEFAULT_OUTPUT };
  if (raw === undefined) {
    return result;
  }

  if ('path' in raw) {
    result.path = validateString(raw.path, 'output.path');
  }
  if ('runtime_module' in raw) {
    result.runtime_module = validateString(raw.runtime_module, 'output.runtime_module');
  }
  if ('verify' in raw) {
    result.verify = validateBoolean(raw.verify, 'output.verify');
  }

  return result;
}

function parseResolver(raw: Section | undefined): ResolverConfig {
  const result: ResolverConfig = { ...DEFAULT_RESOLVER };
  if (raw !== undefined && 'unknown_extensions' in raw) {
    result.unknown_extensions = validateString(
      raw.unknown_extensions,
      'resolver.unknown_extensions'
    );
  }
  return result;
}

function parseLogging(raw: Section | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw !== undefined && 'debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  return result;
}

/**
 * Parses a TOML string into a Config object.
 *
 * Only types are checked here; {@link validateConfig} checks the values.
 *
 * @param tomlContent - Raw TOML content.
 * @returns Configuration with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or mistyped fields.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [bindings]
 * api = "gles2"
 * version = "3.0"
 * generator = "struct"
 * `);
 * console.log(config.bindings.generator); // "struct"
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Section;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    bindings: parseBindings(readSection(parsed, 'bindings')),
    registry: parseRegistry(readSection(parsed, 'registry')),
    output: parseOutput(readSection(parsed, 'output')),
    resolver: parseResolver(readSection(parsed, 'resolver')),
    logging: parseLogging(readSection(parsed, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    bindings: { ...DEFAULT_CONFIG.bindings, extensions: [...DEFAULT_CONFIG.bindings.extensions] },
    registry: { ...DEFAULT_CONFIG.registry },
    output: { ...DEFAULT_CONFIG.output },
    resolver: { ...DEFAULT_CONFIG.resolver },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}
