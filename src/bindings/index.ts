/**
 * The generation pipeline.
 *
 * @packageDocumentation
 */

export {
  generateBindings,
  joinFragments,
  type GenerateOptions,
  type GenerateResult,
} from './generate.js';
export {
  parseRegistry,
  readRegistryFile,
  registryFormat,
  writeBindings,
  type RegistryFormat,
} from './io.js';
