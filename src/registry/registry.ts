/**
 * Raw and resolved registries.
 *
 * @packageDocumentation
 */

import type { TypeAliasTable } from '../type-map/type-map.js';
import type { Command, Enum, Namespace, RawCommand, RawEnum } from './types.js';

/**
 * Everything a registry document declares for one namespace, before filtering.
 *
 * Records appear in document order. The same identifier may appear several
 * times, e.g. once for a core version and once for an extension.
 */
export class RawRegistry {
  private readonly ns: Namespace;
  private readonly enumRecords: readonly RawEnum[];
  private readonly commandRecords: readonly RawCommand[];
  private readonly extensionNames: ReadonlySet<string>;

  /**
   * Creates a raw registry.
   *
   * @param namespace - Namespace the records were read for.
   * @param enums - Enum records in document order.
   * @param commands - Command records in document order.
   * @param extensions - Extension names declared for the namespace. Defaults to
   *   the names referenced by the records.
   */
  constructor(
    namespace: Namespace,
    enums: readonly RawEnum[],
    commands: readonly RawCommand[],
    extensions?: Iterable<string>
  ) {
    this.ns = namespace;
    this.enumRecords = enums;
    this.commandRecords = commands;
    this.extensionNames = new Set(extensions ?? collectExtensionNames(enums, commands));
  }

  namespace(): Namespace {
    return this.ns;
  }

  enums(): readonly RawEnum[] {
    return this.enumRecords;
  }

  commands(): readonly RawCommand[] {
    return this.commandRecords;
  }

  /** Names of every extension the document declares for this namespace. */
  extensions(): ReadonlySet<string> {
    return this.extensionNames;
  }
}

function collectExtensionNames(
  enums: readonly RawEnum[],
  commands: readonly RawCommand[]
): string[] {
  const names: string[] = [];
  for (const record of [...enums, ...commands]) {
    if (record.extension !== undefined) {
      names.push(record.extension);
    }
  }
  return names;
}

/**
 * The filtered, deduplicated definitions of one generation request.
 *
 * Generators consume this and never filter again.
 */
export class Registry {
  private readonly ns: Namespace;
  private readonly enumDefs: readonly Enum[];
  private readonly commandDefs: readonly Command[];
  private readonly types: TypeAliasTable;

  constructor(
    namespace: Namespace,
    enums: readonly Enum[],
    commands: readonly Command[],
    types: TypeAliasTable
  ) {
    this.ns = namespace;
    this.enumDefs = enums;
    this.commandDefs = commands;
    this.types = types;
  }

  namespace(): Namespace {
    return this.ns;
  }

  enums(): readonly Enum[] {
    return this.enumDefs;
  }

  commands(): readonly Command[] {
    return this.commandDefs;
  }

  /** Type aliases of the namespace. */
  typeAliases(): TypeAliasTable {
    return this.types;
  }
}
