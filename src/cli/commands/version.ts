/**
 * Version command handler for the glbindgen CLI.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

import { readFileSync } from 'node:fs';
import type { CliCommandResult } from '../types.js';

const PACKAGE_JSON_URL = new URL('../../../package.json', import.meta.url);

function hasVersion(value: unknown): value is { version: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'version' in value &&
    typeof value.version === 'string'
  );
}

/**
 * Reads the version from package.json.
 *
 * @returns The version string, or '(unknown)' if it cannot be read.
 */
export function getVersionFromPackageJson(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(PACKAGE_JSON_URL, 'utf-8'));
    return hasVersion(packageJson) ? packageJson.version : '(unknown)';
  } catch {
    return '(unknown)';
  }
}

/**
 * Handles the version command.
 */
export function handleVersionCommand(): CliCommandResult {
  console.log(`glbindgen v${getVersionFromPackageJson()}`);
  return { exitCode: 0 };
}
