import { describe, it, expect } from 'vitest';
import { tinyGlPrelude, tinyGlRegistry } from '../../tests/helpers/registries.js';
import { StructGenerator } from './struct-generator.js';
import { syntaxDiagnostics } from './verify.js';

describe('StructGenerator', () => {
  const prelude = tinyGlPrelude('struct');

  it('emits a class owning a binding table', () => {
    const fragments = new StructGenerator().write(tinyGlRegistry());

    expect(fragments.slice(0, 4)).toEqual([
      prelude.header,
      "import { BindingTable, type SymbolLoader, type SymbolNames } from 'glbindgen/runtime';",
      prelude.types,
      prelude.enums,
    ]);
    expect(fragments[4]).toBe(
      [
        'export interface Commands {',
        '  Clear(mask: types.GLbitfield): void;',
        '  GetString(name: types.GLenum): types.Pointer;',
        '}',
      ].join('\n')
    );
    expect(fragments[6]).toBe(
      [
        'export class Gl {',
        '  private readonly table: BindingTable<Commands>;',
        '',
        '  private constructor(table: BindingTable<Commands>) {',
        '    this.table = table;',
        '  }',
        '',
        '  /**',
        '   * Creates an instance and loads every command through `loadfn`.',
        '   */',
        '  static loadWith(loadfn: SymbolLoader<Commands>): Gl {',
        '    const table = new BindingTable<Commands>(SYMBOLS);',
        '    table.loadAll(loadfn);',
        '    return new Gl(table);',
        '  }',
        '',
        '  isLoaded(name: keyof Commands): boolean {',
        '    return this.table.isLoaded(name);',
        '  }',
        '',
        '  Clear(mask: types.GLbitfield): void {',
        "    return this.table.get('Clear')(mask);",
        '  }',
        '',
        '  /** Takes or returns raw pointers. */',
        '  GetString(name: types.GLenum): types.Pointer {',
        "    return this.table.get('GetString')(name);",
        '  }',
        '}',
      ].join('\n')
    );
    expect(fragments).toHaveLength(7);
  });

  it('emits source that parses', () => {
    const source = new StructGenerator().write(tinyGlRegistry()).join('\n\n') + '\n';

    expect(syntaxDiagnostics(source)).toEqual([]);
  });
});
