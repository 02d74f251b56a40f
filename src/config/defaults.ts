/**
 * Default configuration values for glbindgen.toml.
 *
 * @packageDocumentation
 */

import { DEFAULT_RUNTIME_MODULE } from '../generators/types.js';
import { DEFAULT_SELECTION } from '../resolver/filter.js';
import type {
  BindingsConfig,
  Config,
  LoggingConfig,
  OutputConfig,
  RegistryConfig,
  ResolverConfig,
} from './types.js';

/** Default configuration file name, looked up in the working directory. */
export const DEFAULT_CONFIG_FILE = 'glbindgen.toml';

/**
 * OpenGL 1.0 core in the static style, with no extensions.
 */
export const DEFAULT_BINDINGS: BindingsConfig = {
  api: DEFAULT_SELECTION.namespace,
  profile: DEFAULT_SELECTION.profile,
  version: DEFAULT_SELECTION.version,
  generator: 'static',
  extensions: [],
  full: DEFAULT_SELECTION.full,
};

export const DEFAULT_REGISTRY: RegistryConfig = {
  path: undefined,
};

export const DEFAULT_OUTPUT: OutputConfig = {
  path: undefined,
  runtime_module: DEFAULT_RUNTIME_MODULE,
  verify: true,
};

export const DEFAULT_RESOLVER: ResolverConfig = {
  unknown_extensions: 'warn',
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  bindings: DEFAULT_BINDINGS,
  registry: DEFAULT_REGISTRY,
  output: DEFAULT_OUTPUT,
  resolver: DEFAULT_RESOLVER,
  logging: DEFAULT_LOGGING,
};
