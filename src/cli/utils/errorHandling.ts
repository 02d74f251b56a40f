/**
 * Shared error handling utilities for CLI commands.
 */

import type { CliCommandResult } from '../types.js';

/**
 * Message printed for an error of any kind.
 */
export function formatErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs a command handler, printing `Error: <message>` to stderr and
 * returning exit code 1 if it throws.
 *
 * @param fn - The handler to run (sync or async).
 */
export async function runCommand(
  fn: () => CliCommandResult | Promise<CliCommandResult>
): Promise<CliCommandResult> {
  try {
    return await fn();
  } catch (error) {
    console.error(`Error: ${formatErrorMessage(error)}`);
    return { exitCode: 1 };
  }
}

/**
 * Runs the CLI to completion and sets the process exit code.
 *
 * `process.exitCode` is used instead of `process.exit()` so that generated
 * source piped to stdout is flushed before the process ends.
 *
 * @param fn - The function to run.
 */
export function withErrorHandling(fn: () => Promise<CliCommandResult>): void {
  void (async () => {
    const result = await runCommand(fn);
    process.exitCode = result.exitCode;
  })();
}
