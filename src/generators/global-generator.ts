/**
 * The `global` style: free functions dispatching through one module-level
 * binding table.
 *
 * @packageDocumentation
 */

import type { Registry } from '../registry/registry.js';
import type { Command } from '../registry/types.js';
import type { TypeAliasTable } from '../type-map/type-map.js';
import {
  indent,
  renderCommandSignatures,
  renderEnums,
  renderHeader,
  renderParameters,
  renderRuntimeImport,
  renderSafetyNote,
  renderSignature,
  renderSymbolTable,
  renderTypeAliases,
} from './helpers.js';
import { DEFAULT_RUNTIME_MODULE, type Generator, type GeneratorOptions } from './types.js';

const LOAD_ALL = [
  'const STORAGE = new BindingTable<Commands>(SYMBOLS);',
  '',
  '/**',
  ' * Loads every command in one pass. Commands the loader cannot resolve stay',
  ' * unloaded and throw when called.',
  ' *',
  ' * @returns The number of loaded commands.',
  ' */',
  'export function loadWith(loadfn: SymbolLoader<Commands>): number {',
  '  return STORAGE.loadAll(loadfn);',
  '}',
].join('\n');

/**
 * Emits one exported function per command, each merged with a namespace
 * exposing `isLoaded()` and `loadWith(loadfn)` for that command alone.
 */
export class GlobalGenerator implements Generator {
  readonly name = 'global';
  private readonly runtimeModule: string;

  constructor(options: GeneratorOptions = {}) {
    this.runtimeModule = options.runtimeModule ?? DEFAULT_RUNTIME_MODULE;
  }

  write(registry: Registry): string[] {
    const types = registry.typeAliases();
    const fragments = [
      renderHeader(registry.namespace(), this.name),
      renderRuntimeImport(this.runtimeModule),
      renderTypeAliases(types),
    ];
    if (registry.enums().length > 0) {
      fragments.push(renderEnums(registry));
    }
    fragments.push(renderCommandSignatures(registry), renderSymbolTable(registry), LOAD_ALL);
    for (const command of registry.commands()) {
      fragments.push(renderCommand(command, types));
    }
    return fragments;
  }
}

function renderCommand(command: Command, types: TypeAliasTable): string {
  const id = command.identifier;
  const args = renderParameters(command, types, false, true);
  return [
    `${renderSafetyNote(command)}export function ${id}${renderSignature(command, types)} {`,
    `  return STORAGE.get('${id}')(${args});`,
    '}',
    `export namespace ${id} {`,
    indent(
      [
        'export function isLoaded(): boolean {',
        `  return STORAGE.isLoaded('${id}');`,
        '}',
        'export function loadWith(loadfn: SymbolLoader<Commands>): boolean {',
        `  return STORAGE.load('${id}', loadfn);`,
        '}',
      ].join('\n')
    ),
    '}',
  ].join('\n');
}
