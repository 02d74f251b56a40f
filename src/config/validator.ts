/**
 * Semantic validation for configuration values.
 *
 * Checks what the parser's type checks cannot:
 * - selection values name a supported namespace, profile, style and policy
 * - the version parses
 * - the registry document exists, via an injectable path checker
 *
 * @packageDocumentation
 */

import { GENERATOR_NAMES } from '../generators/factory.js';
import { NAMESPACES, PROFILES } from '../registry/namespaces.js';
import { tryParseVersion } from '../registry/version.js';
import { UNKNOWN_EXTENSION_POLICIES } from '../resolver/resolver.js';
import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

/**
 * Result of a path check operation.
 */
export interface PathCheckResult {
  /** Whether the path exists. */
  exists: boolean;
  /** Whether the path is a directory (if it exists). */
  isDirectory?: boolean;
  /** Error message if the check failed. */
  errorMessage?: string;
}

/**
 * Function type for checking path existence.
 */
export type PathChecker = (path: string) => PathCheckResult;

/**
 * Options for semantic validation.
 */
export interface ValidateConfigOptions {
  /**
   * Function to check that the registry document exists.
   * If not provided, the check is skipped.
   */
  pathChecker?: PathChecker;
}

function checkOneOf(
  errors: ValidationError[],
  field: string,
  value: string,
  accepted: readonly string[]
): void {
  if (!accepted.includes(value)) {
    errors.push({
      field,
      value,
      message: `Unknown value '${value}' for '${field}': expected one of ${accepted.join(', ')}`,
    });
  }
}

function validateRegistryPath(
  errors: ValidationError[],
  registryPath: string | undefined,
  pathChecker: PathChecker | undefined
): void {
  if (registryPath === undefined || registryPath.trim() === '') {
    errors.push({
      field: 'registry.path',
      value: registryPath,
      message: 'A registry document is required (registry.path or --registry)',
    });
    return;
  }
  if (pathChecker === undefined) {
    return;
  }
  const result = pathChecker(registryPath);
  if (result.errorMessage !== undefined) {
    errors.push({ field: 'registry.path', value: registryPath, message: result.errorMessage });
  } else if (!result.exists) {
    errors.push({
      field: 'registry.path',
      value: registryPath,
      message: `Registry document '${registryPath}' does not exist`,
    });
  } else if (result.isDirectory === true) {
    errors.push({
      field: 'registry.path',
      value: registryPath,
      message: `Registry document '${registryPath}' is a directory`,
    });
  }
}

/**
 * Validates configuration values.
 *
 * @param config - The configuration to validate.
 * @param options - Validation options.
 * @returns Every validation failure found.
 */
export function validateConfig(
  config: Config,
  options: ValidateConfigOptions = {}
): ValidationResult {
  const errors: ValidationError[] = [];
  const { bindings } = config;

  checkOneOf(errors, 'bindings.api', bindings.api, NAMESPACES);
  checkOneOf(errors, 'bindings.profile', bindings.profile, PROFILES);
  checkOneOf(errors, 'bindings.generator', bindings.generator, GENERATOR_NAMES);
  checkOneOf(
    errors,
    'resolver.unknown_extensions',
    config.resolver.unknown_extensions,
    UNKNOWN_EXTENSION_POLICIES
  );

  if (tryParseVersion(bindings.version) === undefined) {
    errors.push({
      field: 'bindings.version',
      value: bindings.version,
      message: `Malformed version '${bindings.version}': expected <major> or <major>.<minor>`,
    });
  }

  bindings.extensions.forEach((extension, index) => {
    if (extension.trim() === '') {
      errors.push({
        field: `bindings.extensions[${String(index)}]`,
        value: extension,
        message: 'Extension names cannot be empty',
      });
    }
  });

  if (config.output.runtime_module.trim() === '') {
    errors.push({
      field: 'output.runtime_module',
      value: config.output.runtime_module,
      message: 'The runtime module cannot be empty',
    });
  }

  validateRegistryPath(errors, config.registry.path, options.pathChecker);

  return { valid: errors.length === 0, errors };
}

/**
 * Validates configuration and throws on the first failure set.
 *
 * @throws ConfigValidationError listing every failure.
 */
export function assertConfigValid(config: Config, options: ValidateConfigOptions = {}): void {
  const result = validateConfig(config, options);
  if (!result.valid) {
    const summary = result.errors.map((error) => error.message).join('; ');
    throw new ConfigValidationError(`Invalid configuration: ${summary}`, result.errors);
  }
}
