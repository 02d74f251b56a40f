/**
 * Computes the resolved registry of a generation request.
 *
 * @packageDocumentation
 */

import { UnknownExtensionError, UnresolvableSelectionError } from '../errors.js';
import { Registry, type RawRegistry } from '../registry/registry.js';
import type {
  Command,
  Enum,
  Profile,
  Provenance,
  RawCommand,
  RawEnum,
  Version,
} from '../registry/types.js';
import { compareVersions, tryParseVersion } from '../registry/version.js';
import { loadTypeAliases } from '../type-map/type-map.js';
import type { Logger } from '../utils/logger.js';
import { VERSION_FORMATS, type Filter } from './filter.js';

/**
 * What to do with requested extensions the document does not declare.
 */
export type UnknownExtensionPolicy = 'ignore' | 'warn' | 'error';

/** Accepted unknown-extension policies. */
export const UNKNOWN_EXTENSION_POLICIES: readonly UnknownExtensionPolicy[] = [
  'ignore',
  'warn',
  'error',
];

const POLICY_NAMES: ReadonlySet<string> = new Set(UNKNOWN_EXTENSION_POLICIES);

function isUnknownExtensionPolicy(value: string): value is UnknownExtensionPolicy {
  return POLICY_NAMES.has(value);
}

/**
 * Parses an unknown-extension policy name.
 *
 * @throws UnresolvableSelectionError if the name is not a policy.
 */
export function parseUnknownExtensionPolicy(value: string): UnknownExtensionPolicy {
  if (!isUnknownExtensionPolicy(value)) {
    throw new UnresolvableSelectionError('unknown-extension policy', value, UNKNOWN_EXTENSION_POLICIES);
  }
  return value;
}

/**
 * Options for {@link resolveRegistry}.
 */
export interface ResolveOptions {
  /** @defaultValue 'warn' */
  readonly unknownExtensions?: UnknownExtensionPolicy | undefined;
  /** Receives `unknown_extension` warnings and a `registry_resolved` debug entry. */
  readonly logger?: Logger | undefined;
}

/** Parsed filter fields a record is checked against. */
export interface Criteria {
  readonly version: Version;
  readonly profile: Profile;
  readonly extensions: ReadonlySet<string>;
}

function admitsProfile(requested: Profile, recordProfile: Profile | undefined): boolean {
  return requested === 'compatibility' || recordProfile === undefined || recordProfile === 'core';
}

/**
 * Whether a record belongs to the filtered set.
 *
 * Extension records ignore the version. Removals restricted to a profile only
 * apply to core requests, so a compatibility request keeps everything core
 * keeps.
 */
export function isIncluded(record: Provenance, criteria: Criteria): boolean {
  if (record.extension !== undefined) {
    return criteria.extensions.has(record.extension);
  }
  if (record.introducedIn === undefined) {
    return false;
  }
  if (compareVersions(record.introducedIn, criteria.version) > 0) {
    return false;
  }
  if (!admitsProfile(criteria.profile, record.profile)) {
    return false;
  }
  return !record.removedIn.some(
    (removal) =>
      compareVersions(removal.version, criteria.version) <= 0 &&
      (removal.profile === undefined ||
        (criteria.profile === 'core' && removal.profile === 'core'))
  );
}

function dedupe<T extends { readonly identifier: string }>(records: readonly T[]): T[] {
  const seen = new Set<string>();
  const result: T[] = [];
  for (const record of records) {
    if (!seen.has(record.identifier)) {
      seen.add(record.identifier);
      result.push(record);
    }
  }
  return result;
}

function toEnum(record: RawEnum): Enum {
  return { identifier: record.identifier, value: record.value, typeOverride: record.typeOverride };
}

function toCommand(record: RawCommand): Command {
  return {
    identifier: record.identifier,
    params: record.params,
    returns: record.returns,
    isSafe: record.isSafe,
    alias: record.alias,
  };
}

function checkExtensions(
  raw: RawRegistry,
  requested: readonly string[],
  options: ResolveOptions
): void {
  const policy = options.unknownExtensions ?? 'warn';
  const declared = raw.extensions();
  const unknown = requested.filter((name) => !declared.has(name));
  if (unknown.length === 0 || policy === 'ignore') {
    return;
  }
  if (policy === 'error') {
    throw new UnknownExtensionError(unknown);
  }
  for (const name of unknown) {
    options.logger?.warn('unknown_extension', { namespace: raw.namespace(), extension: name });
  }
}

/**
 * Filters a raw registry down to the records a request includes.
 *
 * With a `null` filter every record is kept. Otherwise extension records are
 * kept when their extension is requested, and versioned records when they
 * were introduced at or before the requested version, fit the profile and
 * have not been removed. Records are deduplicated by identifier, first
 * occurrence in document order winning.
 *
 * @param raw - Raw registry.
 * @param filter - Request, or `null` for every record.
 * @param options - Unknown-extension policy and logger.
 * @returns The resolved registry.
 * @throws UnresolvableSelectionError if the filter names another namespace or
 *   its version does not parse.
 * @throws UnknownExtensionError for undeclared extensions under the `error` policy.
 */
export function resolveRegistry(
  raw: RawRegistry,
  filter: Filter | null,
  options: ResolveOptions = {}
): Registry {
  let enums: readonly RawEnum[] = raw.enums();
  let commands: readonly RawCommand[] = raw.commands();

  if (filter !== null) {
    if (filter.namespace !== raw.namespace()) {
      throw new UnresolvableSelectionError('namespace', filter.namespace, [raw.namespace()]);
    }
    const version = tryParseVersion(filter.version);
    if (version === undefined) {
      throw new UnresolvableSelectionError('version', filter.version, VERSION_FORMATS);
    }
    checkExtensions(raw, filter.extensions, options);
    const criteria: Criteria = {
      version,
      profile: filter.profile,
      extensions: new Set(filter.extensions),
    };
    enums = enums.filter((record) => isIncluded(record, criteria));
    commands = commands.filter((record) => isIncluded(record, criteria));
  }

  const registry = new Registry(
    raw.namespace(),
    dedupe(enums).map(toEnum),
    dedupe(commands).map(toCommand),
    loadTypeAliases(raw.namespace())
  );
  options.logger?.debug('registry_resolved', {
    namespace: raw.namespace(),
    full: filter === null,
    enums: registry.enums().length,
    commands: registry.commands().length,
  });
  return registry;
}
