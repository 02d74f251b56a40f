/**
 * The `struct` style: a class whose instances own a binding table.
 *
 * @packageDocumentation
 */

import type { Registry } from '../registry/registry.js';
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
  structName,
} from './helpers.js';
import { DEFAULT_RUNTIME_MODULE, type Generator, type GeneratorOptions } from './types.js';

/**
 * Emits a class named after the namespace (`Gl`, `Egl`, ...). Instances are
 * created loaded by `loadWith` and expose one method per command.
 */
export class StructGenerator implements Generator {
  readonly name = 'struct';
  private readonly runtimeModule: string;

  constructor(options: GeneratorOptions = {}) {
    this.runtimeModule = options.runtimeModule ?? DEFAULT_RUNTIME_MODULE;
  }

  write(registry: Registry): string[] {
    const fragments = [
      renderHeader(registry.namespace(), this.name),
      renderRuntimeImport(this.runtimeModule),
      renderTypeAliases(registry.typeAliases()),
    ];
    if (registry.enums().length > 0) {
      fragments.push(renderEnums(registry));
    }
    fragments.push(
      renderCommandSignatures(registry),
      renderSymbolTable(registry),
      this.renderClass(registry)
    );
    return fragments;
  }

  private renderClass(registry: Registry): string {
    const name = structName(registry.namespace());
    const types = registry.typeAliases();
    const members = [
      [
        'private readonly table: BindingTable<Commands>;',
        '',
        'private constructor(table: BindingTable<Commands>) {',
        '  this.table = table;',
        '}',
      ].join('\n'),
      [
        '/**',
        ' * Creates an instance and loads every command through `loadfn`.',
        ' */',
        `static loadWith(loadfn: SymbolLoader<Commands>): ${name} {`,
        '  const table = new BindingTable<Commands>(SYMBOLS);',
        '  table.loadAll(loadfn);',
        `  return new ${name}(table);`,
        '}',
      ].join('\n'),
      [
        'isLoaded(name: keyof Commands): boolean {',
        '  return this.table.isLoaded(name);',
        '}',
      ].join('\n'),
      ...registry.commands().map((command) =>
        [
          `${renderSafetyNote(command)}${command.identifier}${renderSignature(command, types)} {`,
          `  return this.table.get('${command.identifier}')(${renderParameters(command, types, false, true)});`,
          '}',
        ].join('\n')
      ),
    ];
    return [`export class ${name} {`, indent(members.join('\n\n')), '}'].join('\n');
  }
}
