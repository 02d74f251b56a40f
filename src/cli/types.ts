/**
 * CLI types and interfaces for the glbindgen CLI.
 */

import type { EnvRecord } from '../config/env.js';

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Arguments after the command name.
   */
  args: string[];

  /**
   * Directory relative paths are resolved against.
   */
  cwd: string;

  /**
   * Environment read for GLBINDGEN_* overrides.
   */
  env: EnvRecord;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;
