/**
 * Type mapping from registry type expressions to emitted TypeScript types.
 *
 * The alias tables live in `data/type-aliases.json`: one table of C primitive
 * aliases shared by every namespace, and one table per API family. A table
 * may include other tables (GLX and WGL reuse the GL scalar types).
 *
 * @packageDocumentation
 */

import { readFileSync } from 'node:fs';
import { MalformedInputError, UnknownTypeError } from '../errors.js';
import { NAMESPACE_INFO } from '../registry/namespaces.js';
import type { Namespace, TypeAlias } from '../registry/types.js';

/** Location of the alias tables, relative to this module in both `src/` and `dist/`. */
const DATA_URL = new URL('../../data/type-aliases.json', import.meta.url);

/** Qualifier that prefixes every alias reference in emitted code. */
export const TYPES_NAMESPACE = 'types';

/** Emitted type for every pointer-typed binding. */
export const POINTER_TYPE = `${TYPES_NAMESPACE}.Pointer`;

export type TableKey = 'gl' | 'glx' | 'wgl' | 'egl';

const TABLE_KEYS: readonly TableKey[] = ['gl', 'glx', 'wgl', 'egl'];

export interface AliasTableData {
  readonly include: readonly TableKey[];
  readonly aliases: ReadonlyMap<string, string>;
}

export interface AliasData {
  readonly primitiveAliases: ReadonlyMap<string, string>;
  readonly primitiveNames: ReadonlyMap<string, string>;
  readonly tables: ReadonlyMap<TableKey, AliasTableData>;
}

/**
 * A registry type expression split into its base name and pointer depth.
 */
export interface ParsedTypeExpression {
  /** Base type with qualifiers removed, e.g. `GLchar` for `const GLchar *`. */
  readonly base: string;
  /** Number of `*` and `[]` declarators. */
  readonly pointerDepth: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStringMap(value: unknown, path: string): Map<string, string> {
  if (!isRecord(value)) {
    throw new MalformedInputError(path, 'aliases', 'expected a table of strings');
  }
  const result = new Map<string, string>();
  for (const [key, target] of Object.entries(value)) {
    if (typeof target !== 'string') {
      throw new MalformedInputError(path, key, `expected string, got ${typeof target}`);
    }
    result.set(key, target);
  }
  return result;
}

function isTableKey(value: unknown): value is TableKey {
  return TABLE_KEYS.some((key) => key === value);
}

function readTable(value: unknown, key: TableKey): AliasTableData {
  if (!isRecord(value)) {
    throw new MalformedInputError(`tables.${key}`, key, 'expected a table');
  }
  const include = value.include ?? [];
  if (!Array.isArray(include)) {
    throw new MalformedInputError(`tables.${key}`, 'include', 'expected an array');
  }
  const includes: TableKey[] = [];
  for (const item of include) {
    if (!isTableKey(item)) {
      throw new MalformedInputError(`tables.${key}`, 'include', `unknown table '${String(item)}'`);
    }
    includes.push(item);
  }
  return { include: includes, aliases: readStringMap(value.aliases, `tables.${key}`) };
}

/**
 * Validates the parsed JSON document of alias tables.
 *
 * @param raw - Parsed JSON.
 * @returns The alias data.
 * @throws MalformedInputError if a section is missing or mistyped.
 */
export function parseAliasData(raw: unknown): AliasData {
  if (!isRecord(raw) || !isRecord(raw.primitives) || !isRecord(raw.tables)) {
    throw new MalformedInputError('type-aliases', 'primitives', 'expected primitives and tables');
  }
  const tables = new Map<TableKey, AliasTableData>();
  for (const key of TABLE_KEYS) {
    tables.set(key, readTable(raw.tables[key], key));
  }
  return {
    primitiveAliases: readStringMap(raw.primitives.aliases, 'primitives.aliases'),
    primitiveNames: readStringMap(raw.primitives.names, 'primitives.names'),
    tables,
  };
}

let cachedData: AliasData | undefined;

function loadAliasData(): AliasData {
  if (cachedData === undefined) {
    const text = readFileSync(DATA_URL, 'utf-8');
    cachedData = parseAliasData(JSON.parse(text));
  }
  return cachedData;
}

/**
 * Splits a registry type expression such as `const GLchar *const*` into its
 * base type and pointer depth.
 */
export function parseTypeExpression(typeName: string): ParsedTypeExpression {
  const pointerDepth = (typeName.match(/\*|\[/g) ?? []).length;
  const base = typeName
    .replace(/\[[^\]]*\]/g, ' ')
    .replace(/\*/g, ' ')
    .replace(/\b(?:const|struct|volatile)\b/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
  return { base, pointerDepth };
}

/**
 * The type aliases of one namespace together with the rules that map
 * registry type expressions onto them.
 */
export class TypeAliasTable {
  /** Namespace this table belongs to. */
  public readonly namespace: Namespace;
  private readonly entries: readonly TypeAlias[];
  private readonly byName: ReadonlyMap<string, string>;
  private readonly primitiveNames: ReadonlyMap<string, string>;

  /**
   * Creates a table.
   *
   * @param namespace - Owning namespace.
   * @param entries - Alias declarations in emission order.
   * @param primitiveNames - C primitive spellings mapped to alias names.
   */
  constructor(
    namespace: Namespace,
    entries: readonly TypeAlias[],
    primitiveNames: ReadonlyMap<string, string>
  ) {
    this.namespace = namespace;
    this.entries = entries;
    this.byName = new Map(entries.map((entry) => [entry.name, entry.target]));
    this.primitiveNames = primitiveNames;
  }

  /** Alias declarations in emission order. */
  aliases(): readonly TypeAlias[] {
    return this.entries;
  }

  /** Whether an alias with this name exists. */
  has(name: string): boolean {
    return this.byName.has(name);
  }

  /** Alias used for `TRUE` and `FALSE`. */
  get booleanType(): string {
    return NAMESPACE_INFO[this.namespace].booleanType;
  }

  /**
   * Maps an enum type override (`u`, `ull` or an alias name) to an alias name.
   */
  overrideType(typeOverride: string): string {
    return NAMESPACE_INFO[this.namespace].typeOverrides[typeOverride] ?? typeOverride;
  }

  /**
   * Follows alias targets until a non-alias type expression is reached.
   *
   * @param name - Alias name.
   * @returns The underlying TypeScript type, or `undefined` for unknown names.
   */
  underlyingType(name: string): string | undefined {
    let current = this.byName.get(name);
    const seen = new Set<string>([name]);
    while (current !== undefined && this.byName.has(current) && !seen.has(current)) {
      seen.add(current);
      current = this.byName.get(current);
    }
    return current;
  }

  /**
   * Maps a registry type expression to an emitted type.
   *
   * @param typeName - Registry type expression, e.g. `const GLchar *`.
   * @param owner - Identifier of the referencing command or enum, for errors.
   * @returns `void`, `types.Pointer` or `types.<Alias>`.
   * @throws UnknownTypeError if the base type has no alias.
   */
  resolve(typeName: string, owner: string): string {
    const { base, pointerDepth } = parseTypeExpression(typeName);
    if (base === 'void') {
      return pointerDepth > 0 ? POINTER_TYPE : 'void';
    }
    const alias = this.primitiveNames.get(base) ?? (this.byName.has(base) ? base : undefined);
    if (alias === undefined) {
      throw new UnknownTypeError(typeName, owner);
    }
    return pointerDepth > 0 ? POINTER_TYPE : `${TYPES_NAMESPACE}.${alias}`;
  }
}

function collectTableAliases(
  data: AliasData,
  key: TableKey,
  into: Map<string, string>,
  visited: Set<TableKey>
): void {
  if (visited.has(key)) {
    return;
  }
  visited.add(key);
  const table = data.tables.get(key);
  if (table === undefined) {
    return;
  }
  for (const included of table.include) {
    collectTableAliases(data, included, into, visited);
  }
  for (const [name, target] of table.aliases) {
    if (!into.has(name)) {
      into.set(name, target);
    }
  }
}

/**
 * Builds the alias table of a namespace from alias data.
 */
export function buildTypeAliasTable(namespace: Namespace, data: AliasData): TypeAliasTable {
  const aliases = new Map<string, string>(data.primitiveAliases);
  collectTableAliases(data, NAMESPACE_INFO[namespace].typeTable, aliases, new Set());
  const entries = [...aliases].map(([name, target]) => ({ name, target }));
  return new TypeAliasTable(namespace, entries, data.primitiveNames);
}

const tableCache = new Map<Namespace, TypeAliasTable>();

/**
 * Returns the alias table of a namespace, loading `data/type-aliases.json`
 * on first use.
 */
export function loadTypeAliases(namespace: Namespace): TypeAliasTable {
  let table = tableCache.get(namespace);
  if (table === undefined) {
    table = buildTypeAliasTable(namespace, loadAliasData());
    tableCache.set(namespace, table);
  }
  return table;
}
