/**
 * Generators for the four binding styles and their shared helpers.
 *
 * @packageDocumentation
 */

export {
  DEFAULT_RUNTIME_MODULE,
  type Generator,
  type GeneratorName,
  type GeneratorOptions,
} from './types.js';
export { GENERATOR_NAMES, createGenerator, parseGeneratorName } from './factory.js';
export { GlobalGenerator } from './global-generator.js';
export { StructGenerator } from './struct-generator.js';
export { StaticStructGenerator } from './static-struct-generator.js';
export { StaticGenerator } from './static-generator.js';
export {
  bindingIdentifier,
  commandSymbols,
  enumLiteral,
  renderCommandSignatures,
  renderEnum,
  renderEnums,
  renderExternDeclarations,
  renderHeader,
  renderParameters,
  renderReturn,
  renderSymbolTable,
  renderTypeAliases,
  structName,
  symbolName,
} from './helpers.js';
export { syntaxDiagnostics, verifySource } from './verify.js';
