/**
 * The generator interface.
 *
 * @packageDocumentation
 */

import type { Registry } from '../registry/registry.js';

/**
 * Structural styles of emitted bindings.
 *
 * - `global`: free functions backed by one module-level binding table
 * - `struct`: a class whose instances own a binding table
 * - `static_struct`: a stateless class calling ambient symbols
 * - `static`: ambient declarations only
 */
export type GeneratorName = 'global' | 'struct' | 'static_struct' | 'static';

/**
 * Emits source text for a resolved registry.
 */
export interface Generator {
  readonly name: GeneratorName;

  /**
   * Renders the bindings of a registry.
   *
   * @returns Source fragments in emission order. Joining them with blank
   *   lines gives the module text.
   * @throws UnknownTypeError if a command or enum references a type without alias.
   */
  write(registry: Registry): string[];
}

/**
 * Options shared by every generator.
 */
export interface GeneratorOptions {
  /**
   * Module the dynamically loaded styles import `BindingTable` from.
   * @defaultValue 'glbindgen/runtime'
   */
  readonly runtimeModule?: string | undefined;
}

export const DEFAULT_RUNTIME_MODULE = 'glbindgen/runtime';
