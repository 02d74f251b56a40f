/**
 * Command dispatch for the glbindgen CLI.
 */

import { GENERATE_HELP, handleGenerateCommand } from './commands/generate.js';
import { getVersionFromPackageJson, handleVersionCommand } from './commands/version.js';
import type { EnvRecord } from '../config/env.js';
import type { CliCommandHandler, CliCommandResult, CliContext } from './types.js';
import { runCommand } from './utils/errorHandling.js';

/**
 * Top-level usage text.
 */
export function helpText(): string {
  return `
glbindgen v${getVersionFromPackageJson()}

USAGE:
  glbindgen <command> [options]

COMMANDS:
  generate    Generate TypeScript bindings from a registry document
  help        Show this help message
  version     Show version information

OPTIONS:
  --help, -h     Show help
  --version, -v  Show version information
${GENERATE_HELP}`;
}

const COMMANDS: Readonly<Record<string, CliCommandHandler>> = {
  generate: handleGenerateCommand,
};

/**
 * Options for {@link runCli}.
 */
export interface RunCliOptions {
  cwd?: string | undefined;
  env?: EnvRecord | undefined;
}

/**
 * Runs one CLI invocation.
 *
 * @param argv - Arguments after the program name.
 * @returns The exit code.
 */
export async function runCli(argv: readonly string[], options: RunCliOptions = {}): Promise<number> {
  const [command, ...args] = argv;

  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    console.log(helpText());
    return 0;
  }
  if (command === 'version' || command === '--version' || command === '-v') {
    return handleVersionCommand().exitCode;
  }

  const handler = COMMANDS[command];
  if (handler === undefined) {
    console.error(`Unknown command: ${command}`);
    console.error("Run 'glbindgen help' for usage information.");
    return 1;
  }

  const context: CliContext = {
    args,
    cwd: options.cwd ?? process.cwd(),
    env: options.env ?? process.env,
  };
  const result: CliCommandResult = await runCommand(() => handler(context));
  return result.exitCode;
}
