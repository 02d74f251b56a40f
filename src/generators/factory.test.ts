import { describe, it, expect } from 'vitest';
import { UnresolvableSelectionError } from '../errors.js';
import { tinyGlRegistry } from '../../tests/helpers/registries.js';
import { GENERATOR_NAMES, createGenerator, parseGeneratorName } from './factory.js';

describe('generator factory', () => {
  it.each(GENERATOR_NAMES.map((name) => [name]))('creates the %s generator', (name) => {
    expect(createGenerator(name).name).toBe(name);
  });

  it('passes the runtime module to dynamic styles', () => {
    const fragments = createGenerator('struct', { runtimeModule: '@scope/gl-runtime' }).write(
      tinyGlRegistry()
    );

    expect(fragments[1]).toBe(
      "import { BindingTable, type SymbolLoader, type SymbolNames } from '@scope/gl-runtime';"
    );
  });

  it('parses style names', () => {
    expect(parseGeneratorName('static_struct')).toBe('static_struct');
  });

  it('rejects unknown style names', () => {
    expect(() => parseGeneratorName('dynamic')).toThrow(UnresolvableSelectionError);
    expect(() => parseGeneratorName('dynamic')).toThrow(
      "Unknown generator 'dynamic': expected one of [global, struct, static_struct, static]"
    );
  });
});
