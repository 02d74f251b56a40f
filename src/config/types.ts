/**
 * Configuration types for glbindgen.toml parsing.
 *
 * Field names follow the TOML keys. Selection values stay strings here; the
 * validator checks them against the supported namespaces, profiles and
 * styles.
 *
 * @packageDocumentation
 */

/**
 * What to generate.
 */
export interface BindingsConfig {
  /** Namespace: gl, gles1, gles2, glx, wgl or egl. */
  api: string;
  /** core or compatibility. */
  profile: string;
  /** API version, `"M"` or `"M.m"`. */
  version: string;
  /** global, struct, static_struct or static. */
  generator: string;
  /** Extensions to include. */
  extensions: string[];
  /** Include every record of the document, ignoring the other fields. */
  full: boolean;
}

/**
 * Where the registry document lives.
 */
export interface RegistryConfig {
  /** `.xml` (Khronos registry) or `.toml` (record document). */
  path: string | undefined;
}

/**
 * Where and how generated source is written.
 */
export interface OutputConfig {
  /** Output file. Source goes to stdout when unset. */
  path: string | undefined;
  /** Module the dynamically loaded styles import their runtime from. */
  runtime_module: string;
  /** Parse the emitted source before writing it. */
  verify: boolean;
}

/**
 * Filter resolution settings.
 */
export interface ResolverConfig {
  /** ignore, warn or error. */
  unknown_extensions: string;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Write debug-level log entries. */
  debug: boolean;
}

/**
 * Complete configuration.
 */
export interface Config {
  bindings: BindingsConfig;
  registry: RegistryConfig;
  output: OutputConfig;
  resolver: ResolverConfig;
  logging: LoggingConfig;
}

/**
 * Configuration with every field optional, as produced by environment
 * variables and command-line flags.
 */
export type PartialConfig = {
  [K in keyof Config]?: Partial<Config[K]>;
};
