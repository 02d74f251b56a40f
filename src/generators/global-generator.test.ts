import { describe, it, expect } from 'vitest';
import { tinyGlPrelude, tinyGlRegistry } from '../../tests/helpers/registries.js';
import { GlobalGenerator } from './global-generator.js';
import { syntaxDiagnostics } from './verify.js';

describe('GlobalGenerator', () => {
  const prelude = tinyGlPrelude('global');

  it('emits free functions over a module-level binding table', () => {
    const fragments = new GlobalGenerator().write(tinyGlRegistry());

    expect(fragments).toEqual([
      prelude.header,
      "import { BindingTable, type SymbolLoader, type SymbolNames } from 'glbindgen/runtime';",
      prelude.types,
      prelude.enums,
      [
        'export interface Commands {',
        '  Clear(mask: types.GLbitfield): void;',
        '  GetString(name: types.GLenum): types.Pointer;',
        '}',
      ].join('\n'),
      [
        'const SYMBOLS: SymbolNames<Commands> = {',
        "  Clear: ['glClear'],",
        "  GetString: ['glGetString'],",
        '};',
      ].join('\n'),
      [
        'const STORAGE = new BindingTable<Commands>(SYMBOLS);',
        '',
        '/**',
        ' * Loads every command in one pass. Commands the loader cannot resolve stay',
        ' * unloaded and throw when called.',
        ' *',
        ' * @returns The number of loaded commands.',
        ' */',
        'export function loadWith(loadfn: SymbolLoader<Commands>): number {',
        '  return STORAGE.loadAll(loadfn);',
        '}',
      ].join('\n'),
      [
        'export function Clear(mask: types.GLbitfield): void {',
        "  return STORAGE.get('Clear')(mask);",
        '}',
        'export namespace Clear {',
        '  export function isLoaded(): boolean {',
        "    return STORAGE.isLoaded('Clear');",
        '  }',
        '  export function loadWith(loadfn: SymbolLoader<Commands>): boolean {',
        "    return STORAGE.load('Clear', loadfn);",
        '  }',
        '}',
      ].join('\n'),
      [
        '/** Takes or returns raw pointers. */',
        'export function GetString(name: types.GLenum): types.Pointer {',
        "  return STORAGE.get('GetString')(name);",
        '}',
        'export namespace GetString {',
        '  export function isLoaded(): boolean {',
        "    return STORAGE.isLoaded('GetString');",
        '  }',
        '  export function loadWith(loadfn: SymbolLoader<Commands>): boolean {',
        "    return STORAGE.load('GetString', loadfn);",
        '  }',
        '}',
      ].join('\n'),
    ]);
  });

  it('imports the runtime from the configured module', () => {
    const fragments = new GlobalGenerator({ runtimeModule: './gl-runtime.js' }).write(tinyGlRegistry());

    expect(fragments[1]).toBe(
      "import { BindingTable, type SymbolLoader, type SymbolNames } from './gl-runtime.js';"
    );
  });

  it('omits the enum fragment when there are no enums', () => {
    const fragments = new GlobalGenerator().write(tinyGlRegistry([]));

    expect(fragments[3]?.startsWith('export interface Commands {')).toBe(true);
  });

  it('emits source that parses', () => {
    const source = new GlobalGenerator().write(tinyGlRegistry()).join('\n\n') + '\n';

    expect(syntaxDiagnostics(source)).toEqual([]);
  });
});
