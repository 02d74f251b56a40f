/**
 * Configuration module for glbindgen.toml parsing and validation.
 *
 * Override precedence: command-line flags > env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  BindingsConfig,
  Config,
  LoggingConfig,
  OutputConfig,
  PartialConfig,
  RegistryConfig,
  ResolverConfig,
} from './types.js';
export {
  DEFAULT_BINDINGS,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  DEFAULT_LOGGING,
  DEFAULT_OUTPUT,
  DEFAULT_REGISTRY,
  DEFAULT_RESOLVER,
} from './defaults.js';
export { ConfigValidationError, assertConfigValid, validateConfig } from './validator.js';
export type {
  PathChecker,
  PathCheckResult,
  ValidateConfigOptions,
  ValidationError,
  ValidationResult,
} from './validator.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeConfig,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { loadConfig, type LoadConfigOptions } from './loader.js';
