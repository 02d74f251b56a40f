import { describe, it, expect } from 'vitest';
import { tinyGlPrelude, tinyGlRegistry } from '../../tests/helpers/registries.js';
import { StaticGenerator } from './static-generator.js';

describe('StaticGenerator', () => {
  const prelude = tinyGlPrelude('static');

  it('emits types, enums and ambient declarations only', () => {
    expect(new StaticGenerator().write(tinyGlRegistry())).toEqual([
      prelude.header,
      prelude.types,
      prelude.enums,
      [
        'declare global {',
        '  function glClear(mask: types.GLbitfield): void;',
        '  function glGetString(name: types.GLenum): types.Pointer;',
        '}',
      ].join('\n'),
    ]);
  });

  it('omits the enum fragment when there are no enums', () => {
    expect(new StaticGenerator().write(tinyGlRegistry([]))).toHaveLength(3);
  });
});
