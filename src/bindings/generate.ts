/**
 * The generation pipeline: raw registry and filter in, verified source out.
 *
 * @packageDocumentation
 */

import { createGenerator } from '../generators/factory.js';
import type { GeneratorName } from '../generators/types.js';
import { verifySource } from '../generators/verify.js';
import type { RawRegistry, Registry } from '../registry/registry.js';
import type { Filter } from '../resolver/filter.js';
import { resolveRegistry, type UnknownExtensionPolicy } from '../resolver/resolver.js';
import type { Logger } from '../utils/logger.js';

/**
 * Input of {@link generateBindings}.
 */
export interface GenerateOptions {
  /** Raw registry to generate from. */
  readonly registry: RawRegistry;
  /** Records to include, or `null` for every record. */
  readonly filter: Filter | null;
  readonly generator: GeneratorName;
  /** Module the dynamically loaded styles import their runtime from. */
  readonly runtimeModule?: string | undefined;
  /** @defaultValue 'warn' */
  readonly unknownExtensions?: UnknownExtensionPolicy | undefined;
  /**
   * Parse the emitted source and reject syntax errors.
   * @defaultValue true
   */
  readonly verify?: boolean | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Output of {@link generateBindings}.
 */
export interface GenerateResult {
  /** The resolved registry the source was generated from. */
  readonly registry: Registry;
  /** Source fragments in emission order. */
  readonly fragments: readonly string[];
  /** The complete module text. */
  readonly source: string;
}

/**
 * Joins fragments into module text: one blank line between fragments and a
 * trailing newline.
 */
export function joinFragments(fragments: readonly string[]): string {
  return fragments.join('\n\n') + '\n';
}

/**
 * Resolves a raw registry against a filter and renders it in one style.
 *
 * Any error aborts the request; nothing is returned alongside it.
 *
 * @throws UnresolvableSelectionError, UnknownExtensionError, UnknownTypeError,
 *   MalformedInputError or EmissionError.
 */
export function generateBindings(options: GenerateOptions): GenerateResult {
  const registry = resolveRegistry(options.registry, options.filter, {
    unknownExtensions: options.unknownExtensions,
    logger: options.logger?.child('resolver'),
  });
  const generator = createGenerator(options.generator, { runtimeModule: options.runtimeModule });
  const fragments = generator.write(registry);
  const source = joinFragments(fragments);

  if (options.verify ?? true) {
    verifySource(source, generator.name);
  }

  options.logger?.info('bindings_generated', {
    namespace: registry.namespace(),
    generator: generator.name,
    enums: registry.enums().length,
    commands: registry.commands().length,
    bytes: Buffer.byteLength(source, 'utf-8'),
  });
  return { registry, fragments, source };
}
