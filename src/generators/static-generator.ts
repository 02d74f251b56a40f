/**
 * The `static` style: ambient declarations with no indirection.
 *
 * @packageDocumentation
 */

import type { Registry } from '../registry/registry.js';
import { renderEnums, renderExternDeclarations, renderHeader, renderTypeAliases } from './helpers.js';
import type { Generator } from './types.js';

/**
 * Emits the `types` namespace, the enum constants and one ambient function
 * declaration per command symbol.
 */
export class StaticGenerator implements Generator {
  readonly name = 'static';

  write(registry: Registry): string[] {
    const fragments = [
      renderHeader(registry.namespace(), this.name),
      renderTypeAliases(registry.typeAliases()),
    ];
    if (registry.enums().length > 0) {
      fragments.push(renderEnums(registry));
    }
    fragments.push(renderExternDeclarations(registry));
    return fragments;
  }
}
