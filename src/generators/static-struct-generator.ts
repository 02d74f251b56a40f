/**
 * The `static_struct` style: a stateless class calling ambient symbols.
 *
 * @packageDocumentation
 */

import type { Registry } from '../registry/registry.js';
import {
  indent,
  renderEnums,
  renderExternDeclarations,
  renderHeader,
  renderParameters,
  renderSafetyNote,
  renderSignature,
  renderTypeAliases,
  structName,
  symbolName,
} from './helpers.js';
import type { Generator } from './types.js';

/**
 * Emits the ambient declarations of every symbol and a class whose methods
 * forward to them. The host links the symbols, so `loadWith` loads nothing.
 */
export class StaticStructGenerator implements Generator {
  readonly name = 'static_struct';

  write(registry: Registry): string[] {
    const fragments = [
      renderHeader(registry.namespace(), this.name),
      renderTypeAliases(registry.typeAliases()),
    ];
    if (registry.enums().length > 0) {
      fragments.push(renderEnums(registry));
    }
    fragments.push(renderExternDeclarations(registry), this.renderClass(registry));
    return fragments;
  }

  private renderClass(registry: Registry): string {
    const namespace = registry.namespace();
    const name = structName(namespace);
    const types = registry.typeAliases();
    const members = [
      [
        '/**',
        ' * Returns an instance. The symbols are linked by the host, so the',
        ' * loader is not called.',
        ' */',
        `static loadWith(_loadfn?: unknown): ${name} {`,
        `  return new ${name}();`,
        '}',
      ].join('\n'),
      ...registry.commands().map((command) =>
        [
          `${renderSafetyNote(command)}${command.identifier}${renderSignature(command, types)} {`,
          `  return ${symbolName(namespace, command.identifier)}(${renderParameters(command, types, false, true)});`,
          '}',
        ].join('\n')
      ),
    ];
    return [`export class ${name} {`, indent(members.join('\n\n')), '}'].join('\n');
  }
}
