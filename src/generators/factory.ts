/**
 * Generator lookup by style name.
 *
 * @packageDocumentation
 */

import { UnresolvableSelectionError } from '../errors.js';
import { GlobalGenerator } from './global-generator.js';
import { StaticGenerator } from './static-generator.js';
import { StaticStructGenerator } from './static-struct-generator.js';
import { StructGenerator } from './struct-generator.js';
import type { Generator, GeneratorName, GeneratorOptions } from './types.js';

/** Every generator style. */
export const GENERATOR_NAMES: readonly GeneratorName[] = [
  'global',
  'struct',
  'static_struct',
  'static',
];

const GENERATOR_NAME_SET: ReadonlySet<string> = new Set(GENERATOR_NAMES);

function isGeneratorName(value: string): value is GeneratorName {
  return GENERATOR_NAME_SET.has(value);
}

/**
 * Parses a generator style name.
 *
 * @throws UnresolvableSelectionError if the name is not a style.
 */
export function parseGeneratorName(value: string): GeneratorName {
  if (!isGeneratorName(value)) {
    throw new UnresolvableSelectionError('generator', value, GENERATOR_NAMES);
  }
  return value;
}

/**
 * Creates the generator of a style.
 *
 * @param name - Style name.
 * @param options - Options for the dynamically loaded styles.
 */
export function createGenerator(name: GeneratorName, options: GeneratorOptions = {}): Generator {
  switch (name) {
    case 'global':
      return new GlobalGenerator(options);
    case 'struct':
      return new StructGenerator(options);
    case 'static_struct':
      return new StaticStructGenerator();
    case 'static':
      return new StaticGenerator();
  }
}
