/**
 * Generation filters and the selection defaults they are built from.
 *
 * @packageDocumentation
 */

import { UnresolvableSelectionError } from '../errors.js';
import { parseNamespace, parseProfile } from '../registry/namespaces.js';
import type { Namespace, Profile } from '../registry/types.js';
import { tryParseVersion } from '../registry/version.js';

/**
 * What a generation request includes. `null` in place of a filter selects
 * every record of the document.
 */
export interface Filter {
  readonly namespace: Namespace;
  /** `"M"` or `"M.m"`. */
  readonly version: string;
  readonly profile: Profile;
  /** Requested extension names, e.g. `GL_EXT_texture_filter_anisotropic`. */
  readonly extensions: readonly string[];
}

/**
 * Unvalidated selection values as they arrive from configuration or flags.
 */
export interface Selection {
  readonly namespace?: string | undefined;
  readonly profile?: string | undefined;
  readonly version?: string | undefined;
  readonly extensions?: readonly string[] | undefined;
  /** Select every record, ignoring the other fields. */
  readonly full?: boolean | undefined;
}

/** Defaults applied to absent selection fields. */
export const DEFAULT_SELECTION = {
  namespace: 'gl',
  profile: 'core',
  version: '1.0',
  extensions: [],
  full: false,
} as const satisfies Required<Selection>;

/** Shapes a version string may take. */
export const VERSION_FORMATS: readonly string[] = ['<major>', '<major>.<minor>'];

/**
 * Checks that a version string parses.
 *
 * @returns The trimmed version string.
 * @throws UnresolvableSelectionError otherwise.
 */
export function validateVersion(version: string): string {
  if (tryParseVersion(version) === undefined) {
    throw new UnresolvableSelectionError('version', version, VERSION_FORMATS);
  }
  return version.trim();
}

/**
 * Validates a selection and applies defaults.
 *
 * @returns The filter, or `null` when the selection asks for full mode.
 * @throws UnresolvableSelectionError for an unknown namespace or profile or a
 *   malformed version.
 */
export function selectionToFilter(selection: Selection): Filter | null {
  const namespace = parseNamespace(selection.namespace ?? DEFAULT_SELECTION.namespace);
  const profile = parseProfile(selection.profile ?? DEFAULT_SELECTION.profile);
  const version = validateVersion(selection.version ?? DEFAULT_SELECTION.version);
  if (selection.full ?? DEFAULT_SELECTION.full) {
    return null;
  }
  return {
    namespace,
    profile,
    version,
    extensions: [...new Set(selection.extensions ?? DEFAULT_SELECTION.extensions)],
  };
}
