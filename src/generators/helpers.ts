/**
 * Emission helpers shared by every generator.
 *
 * @packageDocumentation
 */

import { MalformedInputError, UnknownTypeError } from '../errors.js';
import { NAMESPACE_INFO } from '../registry/namespaces.js';
import type { Registry } from '../registry/registry.js';
import type { Binding, Command, Enum, Namespace } from '../registry/types.js';
import { TYPES_NAMESPACE, type TypeAliasTable } from '../type-map/type-map.js';
import type { GeneratorName } from './types.js';

const INDENT = '  ';

/** Words that cannot name a parameter in emitted code. */
const RESERVED_WORDS: ReadonlySet<string> = new Set([
  'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger', 'default', 'delete',
  'do', 'else', 'enum', 'export', 'extends', 'false', 'finally', 'for', 'function', 'if',
  'import', 'in', 'instanceof', 'new', 'null', 'return', 'super', 'switch', 'this', 'throw',
  'true', 'try', 'typeof', 'var', 'void', 'while', 'with', 'yield', 'let', 'static',
  'implements', 'interface', 'package', 'private', 'protected', 'public', 'await',
  'type', 'ref', 'arguments', 'eval',
]);

/**
 * Escapes a string for a single-quoted literal.
 */
export function escapeString(str: string): string {
  return str.replace(/\\/g, '\\\\').replace(/'/g, "\\'").replace(/\n/g, '\\n').replace(/\r/g, '\\r');
}

/**
 * Indents every non-empty line of a block.
 */
export function indent(text: string, depth = 1): string {
  const prefix = INDENT.repeat(depth);
  return text
    .split('\n')
    .map((line) => (line === '' ? line : prefix + line))
    .join('\n');
}

/**
 * The linked symbol of a command, e.g. `glClear` for `Clear` in `gl`.
 */
export function symbolName(namespace: Namespace, identifier: string): string {
  return NAMESPACE_INFO[namespace].symbolPrefix + identifier;
}

/** Name of the class emitted by the struct styles, e.g. `Gl`. */
export function structName(namespace: Namespace): string {
  return NAMESPACE_INFO[namespace].structName;
}

/**
 * Parameter name in emitted code. Reserved words get a trailing underscore.
 */
export function bindingIdentifier(binding: Binding): string {
  return RESERVED_WORDS.has(binding.identifier) ? `${binding.identifier}_` : binding.identifier;
}

/**
 * Renders a command's parameter list.
 *
 * | includeTypes | includeIdentifiers | `Clear` renders as     |
 * |--------------|--------------------|------------------------|
 * | true         | true               | `mask: types.GLbitfield` |
 * | true         | false              | `types.GLbitfield`     |
 * | false        | true               | `mask`                 |
 * | false        | false              | `_0`                   |
 *
 * @throws UnknownTypeError if a parameter type has no alias.
 */
export function renderParameters(
  command: Command,
  types: TypeAliasTable,
  includeTypes: boolean,
  includeIdentifiers: boolean
): string {
  return command.params
    .map((param, index) => {
      const name = includeIdentifiers ? bindingIdentifier(param) : `_${String(index)}`;
      if (!includeTypes) {
        return name;
      }
      const type = types.resolve(param.typeName, command.identifier);
      return includeIdentifiers ? `${name}: ${type}` : type;
    })
    .join(', ');
}

/**
 * Renders a command's return type.
 *
 * @throws UnknownTypeError if the return type has no alias.
 */
export function renderReturn(command: Command, types: TypeAliasTable): string {
  return types.resolve(command.returns.typeName, command.identifier);
}

const NUMERIC_LITERAL = /^-?(?:0[xX][0-9a-fA-F]+|\d+(?:\.\d+)?)$/;
const EGL_CAST = /^EGL_CAST\s*\(\s*[^,]+,\s*(.+)\)$/;
const C_CAST = /^\(\s*\(\s*[A-Za-z_][\w\s]*\**\s*\)\s*(.+)\)$/;
const INTEGER_SUFFIX = /^(-?(?:0[xX][0-9a-fA-F]+|\d+))[uUlL]+$/;
const STRING_LITERAL = /^"([^"]*)"$/;

/**
 * Reduces a document value to a numeric literal: casts are unwrapped and
 * integer suffixes dropped, e.g. `EGL_CAST(EGLint,-1)` to `-1` and
 * `0xFFFFFFFFu` to `0xFFFFFFFF`.
 *
 * @throws MalformedInputError if what remains is not a number.
 */
export function enumLiteral(enm: Enum): string {
  let value = enm.value.trim();
  for (;;) {
    const cast = EGL_CAST.exec(value) ?? C_CAST.exec(value);
    const inner = cast?.[1];
    if (inner !== undefined) {
      value = inner.trim();
    } else if (value.startsWith('(') && value.endsWith(')')) {
      value = value.slice(1, -1).trim();
    } else {
      break;
    }
  }
  const suffixed = INTEGER_SUFFIX.exec(value);
  value = suffixed?.[1] ?? value;
  if (!NUMERIC_LITERAL.test(value)) {
    throw new MalformedInputError(enm.identifier, 'value', `'${enm.value}' is not a numeric literal`);
  }
  return value;
}

/**
 * Renders one enum constant.
 *
 * `TRUE` and `FALSE` always take the namespace's boolean type. Otherwise a
 * type override wins over `defaultType`. Values of 64-bit types are emitted
 * as bigint literals. Quoted values, such as `GLX_EXTENSION_NAME`, become
 * string constants.
 *
 * @param enm - The enum.
 * @param defaultType - Alias name for enums without an override, e.g. `GLenum`.
 * @param types - Alias table of the namespace.
 * @returns e.g. `export const TEXTURE_2D: types.GLenum = 0x0DE1;`
 * @throws UnknownTypeError if the chosen type has no alias.
 * @throws MalformedInputError if the value is not numeric.
 */
export function renderEnum(enm: Enum, defaultType: string, types: TypeAliasTable): string {
  const identifier = /^\d/.test(enm.identifier) ? `_${enm.identifier}` : enm.identifier;
  const quoted = STRING_LITERAL.exec(enm.value.trim())?.[1];
  if (quoted !== undefined) {
    return `export const ${identifier}: string = '${escapeString(quoted)}';`;
  }
  let typeName: string;
  if (enm.identifier === 'TRUE' || enm.identifier === 'FALSE') {
    typeName = types.booleanType;
  } else if (enm.typeOverride !== undefined) {
    typeName = types.overrideType(enm.typeOverride);
  } else {
    typeName = defaultType;
  }
  if (!types.has(typeName)) {
    throw new UnknownTypeError(typeName, enm.identifier);
  }
  const literal = enumLiteral(enm);
  const value = types.underlyingType(typeName) === 'bigint' ? `${literal}n` : literal;
  return `export const ${identifier}: ${TYPES_NAMESPACE}.${typeName} = ${value};`;
}

/**
 * Renders the leading comment of a generated module.
 */
export function renderHeader(namespace: Namespace, generator: GeneratorName): string {
  return [
    `// ${namespace} bindings in the ${generator} style, generated by glbindgen.`,
    '// Do not edit by hand.',
  ].join('\n');
}

/**
 * Renders the `types` namespace holding every alias of the namespace.
 */
export function renderTypeAliases(types: TypeAliasTable): string {
  const lines = types
    .aliases()
    .map((alias) => `${INDENT}export type ${alias.name} = ${alias.target};`);
  return [`export namespace ${TYPES_NAMESPACE} {`, ...lines, '}'].join('\n');
}

/**
 * Renders every enum constant of a registry, one per line.
 */
export function renderEnums(registry: Registry): string {
  const types = registry.typeAliases();
  const defaultType = NAMESPACE_INFO[registry.namespace()].enumType;
  return registry
    .enums()
    .map((enm) => renderEnum(enm, defaultType, types))
    .join('\n');
}

/**
 * The function signature of a command, e.g. `(mask: types.GLbitfield): void`.
 */
export function renderSignature(command: Command, types: TypeAliasTable): string {
  return `(${renderParameters(command, types, true, true)}): ${renderReturn(command, types)}`;
}

/**
 * Doc comment emitted before commands that take or return raw pointers.
 * Empty for safe commands.
 */
export function renderSafetyNote(command: Command): string {
  return command.isSafe ? '' : '/** Takes or returns raw pointers. */\n';
}

/**
 * Renders the `Commands` interface: one method signature per command. The
 * dynamically loaded styles type their binding table with it.
 */
export function renderCommandSignatures(registry: Registry): string {
  const types = registry.typeAliases();
  const lines = registry
    .commands()
    .map((command) => `${INDENT}${command.identifier}${renderSignature(command, types)};`);
  return ['export interface Commands {', ...lines, '}'].join('\n');
}

/**
 * Symbols to look up for each command: its own symbol, then the symbols of
 * commands it aliases or that alias it.
 */
export function commandSymbols(registry: Registry): Map<string, string[]> {
  const namespace = registry.namespace();
  const aliasedBy = new Map<string, string[]>();
  for (const command of registry.commands()) {
    if (command.alias !== undefined) {
      const existing = aliasedBy.get(command.alias) ?? [];
      existing.push(command.identifier);
      aliasedBy.set(command.alias, existing);
    }
  }

  const result = new Map<string, string[]>();
  for (const command of registry.commands()) {
    const related = [...(aliasedBy.get(command.identifier) ?? [])];
    if (command.alias !== undefined) {
      related.push(command.alias);
    }
    const symbols = [command.identifier, ...related].map((id) => symbolName(namespace, id));
    result.set(command.identifier, [...new Set(symbols)]);
  }
  return result;
}

/**
 * Renders the `SYMBOLS` table passed to the binding table.
 */
export function renderSymbolTable(registry: Registry): string {
  const lines = [...commandSymbols(registry)].map(
    ([identifier, symbols]) =>
      `${INDENT}${identifier}: [${symbols.map((symbol) => `'${escapeString(symbol)}'`).join(', ')}],`
  );
  return ['const SYMBOLS: SymbolNames<Commands> = {', ...lines, '};'].join('\n');
}

/**
 * Renders the ambient declaration of every command symbol.
 */
export function renderExternDeclarations(registry: Registry): string {
  const types = registry.typeAliases();
  const namespace = registry.namespace();
  const lines = registry
    .commands()
    .map(
      (command) =>
        `${INDENT}function ${symbolName(namespace, command.identifier)}${renderSignature(command, types)};`
    );
  return ['declare global {', ...lines, '}'].join('\n');
}

/**
 * Renders the import of the binding runtime.
 */
export function renderRuntimeImport(runtimeModule: string): string {
  return `import { BindingTable, type SymbolLoader, type SymbolNames } from '${escapeString(runtimeModule)}';`;
}
