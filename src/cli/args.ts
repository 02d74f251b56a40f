/**
 * Argument parsing for `glbindgen generate`.
 */

import * as path from 'node:path';
import type {
  BindingsConfig,
  LoggingConfig,
  OutputConfig,
  PartialConfig,
  RegistryConfig,
  ResolverConfig,
} from '../config/types.js';

/**
 * Error thrown for unknown options, missing option values and stray
 * positional arguments.
 */
export class CliArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliArgumentError';
  }
}

/**
 * Parsed `generate` arguments.
 */
export interface GenerateArgs {
  /** Explicit configuration file, resolved against the working directory. */
  configPath: string | undefined;
  /** Configuration fields set by flags. */
  overrides: PartialConfig;
  /** `--help` was given. */
  help: boolean;
}

const VALUE_OPTIONS: ReadonlySet<string> = new Set([
  '--config',
  '--registry',
  '--api',
  '--profile',
  '--api-version',
  '--generator',
  '--extension',
  '--out',
  '--runtime-module',
  '--unknown-extensions',
]);

/**
 * Splits `--name=value` into name and value.
 */
function splitInline(arg: string): { name: string; inline: string | undefined } {
  const eq = arg.indexOf('=');
  if (!arg.startsWith('--') || eq === -1) {
    return { name: arg, inline: undefined };
  }
  return { name: arg.slice(0, eq), inline: arg.slice(eq + 1) };
}

/**
 * Parses the arguments of `glbindgen generate`.
 *
 * @param args - Arguments after the command name.
 * @param cwd - Directory relative paths are resolved against.
 * @throws CliArgumentError for unknown options or missing values.
 *
 * @example
 * ```typescript
 * const { overrides } = parseGenerateArgs(['--api', 'gles2', '--api-version', '3.0'], '/work');
 * console.log(overrides.bindings); // { api: 'gles2', version: '3.0' }
 * ```
 */
export function parseGenerateArgs(args: readonly string[], cwd: string): GenerateArgs {
  const bindings: Partial<BindingsConfig> = {};
  const registry: Partial<RegistryConfig> = {};
  const output: Partial<OutputConfig> = {};
  const resolver: Partial<ResolverConfig> = {};
  const logging: Partial<LoggingConfig> = {};
  const extensions: string[] = [];
  let configPath: string | undefined;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const { name, inline } = splitInline(arg);

    if (!VALUE_OPTIONS.has(name)) {
      if (inline !== undefined) {
        throw new CliArgumentError(`Option '${name}' does not take a value`);
      }
      switch (name) {
        case '--full':
          bindings.full = true;
          break;
        case '--no-verify':
          output.verify = false;
          break;
        case '--debug':
          logging.debug = true;
          break;
        case '--help':
        case '-h':
          help = true;
          break;
        default:
          throw new CliArgumentError(
            name.startsWith('-') ? `Unknown option: ${name}` : `Unexpected argument: ${name}`
          );
      }
      continue;
    }

    let value = inline;
    if (value === undefined) {
      i += 1;
      value = args[i];
    }
    if (value === undefined || value === '') {
      throw new CliArgumentError(`Option '${name}' requires a value`);
    }

    switch (name) {
      case '--config':
        configPath = path.resolve(cwd, value);
        break;
      case '--registry':
        registry.path = path.resolve(cwd, value);
        break;
      case '--api':
        bindings.api = value;
        break;
      case '--profile':
        bindings.profile = value;
        break;
      case '--api-version':
        bindings.version = value;
        break;
      case '--generator':
        bindings.generator = value;
        break;
      case '--extension':
        extensions.push(value);
        break;
      case '--out':
        output.path = path.resolve(cwd, value);
        break;
      case '--runtime-module':
        output.runtime_module = value;
        break;
      case '--unknown-extensions':
        resolver.unknown_extensions = value;
        break;
    }
  }

  if (extensions.length > 0) {
    bindings.extensions = extensions;
  }

  return { configPath, overrides: { bindings, registry, output, resolver, logging }, help };
}
