/**
 * API version parsing and ordering.
 *
 * @packageDocumentation
 */

import type { Version } from './types.js';

/** `M` or `M.m`. */
const VERSION_PATTERN = /^(\d+)(?:\.(\d+))?$/;

/**
 * Parses a version string into a comparable pair.
 *
 * @param text - Version text such as `"4.3"` or `"2"`.
 * @returns The parsed version, or `undefined` if the text is not a version.
 */
export function tryParseVersion(text: string): Version | undefined {
  const match = VERSION_PATTERN.exec(text.trim());
  if (match === null) {
    return undefined;
  }
  const major = match[1];
  if (major === undefined) {
    return undefined;
  }
  return { major: Number(major), minor: Number(match[2] ?? '0') };
}

/**
 * Orders two versions.
 *
 * @returns A negative number, zero or a positive number.
 */
export function compareVersions(a: Version, b: Version): number {
  if (a.major !== b.major) {
    return a.major - b.major;
  }
  return a.minor - b.minor;
}

/**
 * Formats a version as `major.minor`.
 */
export function formatVersion(version: Version): string {
  return `${String(version.major)}.${String(version.minor)}`;
}
