/**
 * Reader for registry record documents written in TOML.
 *
 * A record document lists already-extracted enums and commands with their
 * provenance, for registries that are not shipped as Khronos XML:
 *
 * ```toml
 * namespace = "gl"
 * extensions = ["GL_EXT_foo"]
 *
 * [[enums]]
 * identifier = "COLOR_BUFFER_BIT"
 * value = "0x00004000"
 * introduced_in = "1.0"
 *
 * [[commands]]
 * identifier = "Clear"
 * return = { type_name = "void" }
 * parameters = [{ identifier = "mask", type_name = "GLbitfield" }]
 * is_safe = true
 * introduced_in = "1.0"
 * ```
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { MalformedInputError } from '../errors.js';
import { parseNamespace, parseProfile } from './namespaces.js';
import { RawRegistry } from './registry.js';
import { tryParseVersion } from './version.js';
import type {
  Binding,
  Namespace,
  Profile,
  Provenance,
  RawCommand,
  RawEnum,
  Removal,
  Version,
} from './types.js';

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(table: Table, field: string, recordId: string): string {
  const value = table[field];
  if (typeof value !== 'string') {
    throw new MalformedInputError(recordId, field, `expected string, got ${typeof value}`);
  }
  return value;
}

function readOptionalString(table: Table, field: string, recordId: string): string | undefined {
  return field in table ? readString(table, field, recordId) : undefined;
}

function readBoolean(table: Table, field: string, recordId: string): boolean {
  const value = table[field];
  if (typeof value !== 'boolean') {
    throw new MalformedInputError(recordId, field, `expected boolean, got ${typeof value}`);
  }
  return value;
}

function readTables(table: Table, field: string, recordId: string): Table[] {
  const value = table[field] ?? [];
  if (!Array.isArray(value)) {
    throw new MalformedInputError(recordId, field, 'expected an array of tables');
  }
  const items: readonly unknown[] = value;
  return items.map((item, index) => {
    if (!isTable(item)) {
      throw new MalformedInputError(recordId, `${field}[${String(index)}]`, 'expected a table');
    }
    return item;
  });
}

function readVersion(text: string, field: string, recordId: string): Version {
  const version = tryParseVersion(text);
  if (version === undefined) {
    throw new MalformedInputError(recordId, field, `'${text}' is not a version`);
  }
  return version;
}

function readProfileField(table: Table, field: string, recordId: string): Profile | undefined {
  const value = readOptionalString(table, field, recordId);
  if (value === undefined) {
    return undefined;
  }
  try {
    return parseProfile(value);
  } catch (error) {
    throw new MalformedInputError(
      recordId,
      field,
      `unknown profile '${value}'`,
      error instanceof Error ? error : undefined
    );
  }
}

function readProvenance(table: Table, recordId: string): Provenance {
  const introduced = readOptionalString(table, 'introduced_in', recordId);
  const removedIn: Removal[] = readTables(table, 'removed_in', recordId).map((removal) => ({
    version: readVersion(readString(removal, 'version', recordId), 'removed_in', recordId),
    profile: readProfileField(removal, 'profile', recordId),
  }));
  return {
    introducedIn:
      introduced === undefined ? undefined : readVersion(introduced, 'introduced_in', recordId),
    removedIn,
    extension: readOptionalString(table, 'extension', recordId),
    profile: readProfileField(table, 'profile', recordId),
  };
}

function readEnumRecord(table: Table, index: number): RawEnum {
  const identifier = readString(table, 'identifier', `enums[${String(index)}]`);
  return {
    identifier,
    value: readString(table, 'value', identifier),
    typeOverride: readOptionalString(table, 'type_override', identifier),
    ...readProvenance(table, identifier),
  };
}

function readBindingRecord(table: Table, recordId: string, isReturn: boolean): Binding {
  return {
    identifier: isReturn
      ? (readOptionalString(table, 'identifier', recordId) ?? '')
      : readString(table, 'identifier', recordId),
    typeName: readString(table, 'type_name', recordId),
    group: readOptionalString(table, 'group', recordId),
    len: readOptionalString(table, 'len', recordId),
  };
}

function readCommandRecord(table: Table, index: number): RawCommand {
  const identifier = readString(table, 'identifier', `commands[${String(index)}]`);
  const returns = table.return;
  if (!isTable(returns)) {
    throw new MalformedInputError(identifier, 'return', 'expected a table');
  }
  return {
    identifier,
    params: readTables(table, 'parameters', identifier).map((param) =>
      readBindingRecord(param, identifier, false)
    ),
    returns: readBindingRecord(returns, identifier, true),
    isSafe: readBoolean(table, 'is_safe', identifier),
    alias: readOptionalString(table, 'alias', identifier),
    ...readProvenance(table, identifier),
  };
}

function readNamespace(document: Table): Namespace {
  const name = readString(document, 'namespace', 'document');
  try {
    return parseNamespace(name);
  } catch (error) {
    throw new MalformedInputError(
      'document',
      'namespace',
      `unknown namespace '${name}'`,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Parses a TOML record document into a raw registry.
 *
 * @param toml - Record document text.
 * @returns The raw registry, records in document order.
 * @throws MalformedInputError if the document is not valid TOML or a record
 *   field is missing or mistyped.
 */
export function parseRegistryRecords(toml: string): RawRegistry {
  let document: Table;
  try {
    document = TOML.parse(toml);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new MalformedInputError('document', 'toml', cause?.message ?? 'invalid TOML', cause);
  }

  const namespace = readNamespace(document);
  let extensions: string[] | undefined;
  if ('extensions' in document) {
    const value = document.extensions;
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
      throw new MalformedInputError('document', 'extensions', 'expected an array of strings');
    }
    extensions = value;
  }

  const enums = readTables(document, 'enums', 'document').map(readEnumRecord);
  const commands = readTables(document, 'commands', 'document').map(readCommandRecord);
  return new RawRegistry(namespace, enums, commands, extensions);
}
