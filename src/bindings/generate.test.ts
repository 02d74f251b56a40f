import { describe, it, expect, vi } from 'vitest';
import { readFixture } from '../../tests/helpers/fixtures.js';
import { EmissionError, UnknownTypeError } from '../errors.js';
import { GENERATOR_NAMES } from '../generators/factory.js';
import { parseRegistryRecords } from '../registry/records.js';
import { RawRegistry } from '../registry/registry.js';
import type { RawCommand } from '../registry/types.js';
import { readRegistryXml } from '../registry/xml-reader.js';
import type { Filter } from '../resolver/filter.js';
import { Logger } from '../utils/logger.js';
import { generateBindings, joinFragments } from './generate.js';

const MINI_GL = readRegistryXml(readFixture('mini-gl.xml'), 'gl');
const MINI_EGL = parseRegistryRecords(readFixture('mini-egl.toml'));
const GL_CORE_32: Filter = { namespace: 'gl', version: '3.2', profile: 'core', extensions: [] };

function rawCommand(identifier: string, typeName: string): RawCommand {
  return {
    identifier,
    params: [],
    returns: { identifier: '', typeName },
    isSafe: true,
    introducedIn: { major: 1, minor: 0 },
    removedIn: [],
  };
}

describe('joinFragments', () => {
  it('separates fragments with a blank line and ends with a newline', () => {
    expect(joinFragments(['a', 'b\nc'])).toBe('a\n\nb\nc\n');
  });
});

describe('generateBindings', () => {
  it('renders the resolved registry', () => {
    const result = generateBindings({ registry: MINI_GL, filter: GL_CORE_32, generator: 'static' });
    const lines = result.source.split('\n');

    expect(result.source).toBe(joinFragments(result.fragments));
    expect(lines[0]).toBe('// gl bindings in the static style, generated by glbindgen.');
    expect(lines).toContain('export const TRUE: types.GLboolean = 1;');
    expect(lines).toContain('export const INVALID_INDEX: types.GLuint = 0xFFFFFFFF;');
    expect(lines).toContain('export const TIMEOUT_IGNORED: types.GLuint64 = 0xFFFFFFFFFFFFFFFFn;');
    expect(lines).toContain('  function glGetString(name: types.GLenum): types.Pointer;');
    expect(lines).not.toContain('  function glColor3f(red: types.GLfloat, green: types.GLfloat, blue: types.GLfloat): void;');
    expect(result.registry.commands()).toHaveLength(3);
  });

  it.each(GENERATOR_NAMES.map((name) => [name]))('emits parseable %s bindings', (generator) => {
    const filter: Filter = {
      namespace: 'gl',
      version: '4.6',
      profile: 'compatibility',
      extensions: ['GL_ARB_vertex_buffer_object', 'GL_EXT_clear_control'],
    };

    expect(() => generateBindings({ registry: MINI_GL, filter, generator })).not.toThrow();
  });

  it('renders a record document', () => {
    const filter: Filter = {
      namespace: 'egl',
      version: '1.5',
      profile: 'core',
      extensions: ['EGL_KHR_fence_sync', 'EGL_KHR_reusable_sync'],
    };

    const { source } = generateBindings({ registry: MINI_EGL, filter, generator: 'struct' });
    const lines = source.split('\n');

    expect(lines).toContain('export const FALSE: types.EGLBoolean = 0;');
    expect(lines).toContain('export const DONT_CARE: types.EGLint = -1;');
    expect(lines).toContain('export const FOREVER_KHR: types.EGLuint64KHR = 0xFFFFFFFFFFFFFFFFn;');
    expect(lines).toContain('export class Egl {');
    expect(lines).toContain(
      '  CreateSyncKHR(dpy: types.EGLDisplay, type_: types.EGLenum, attrib_list: types.Pointer): types.EGLSyncKHR {'
    );
    expect(lines).toContain("    return this.table.get('CreateSyncKHR')(dpy, type_, attrib_list);");
  });

  it('renders GLX string constants', () => {
    const registry = readRegistryXml(readFixture('mini-glx.xml'), 'glx');
    const filter: Filter = { namespace: 'glx', version: '1.4', profile: 'core', extensions: [] };

    const lines = generateBindings({ registry, filter, generator: 'static' }).source.split('\n');

    expect(lines).toContain("export const EXTENSION_NAME: string = 'GLX';");
    expect(lines).toContain('export const USE_GL: types.GLenum = 1;');
    expect(lines).toContain('  function glXGetCurrentDrawable(): types.GLXDrawable;');
  });

  it('logs a summary of the generated module', () => {
    const logger = new Logger({ component: 'test' });
    const info = vi.spyOn(logger, 'info').mockImplementation(() => undefined);

    const result = generateBindings({
      registry: MINI_GL,
      filter: GL_CORE_32,
      generator: 'global',
      logger,
    });

    expect(info).toHaveBeenCalledWith('bindings_generated', {
      namespace: 'gl',
      generator: 'global',
      enums: 6,
      commands: 3,
      bytes: Buffer.byteLength(result.source, 'utf-8'),
    });
  });

  it('logs resolution under a resolver component', () => {
    const entries: unknown[] = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      entries.push(JSON.parse(String(chunk)));
      return true;
    });

    generateBindings({
      registry: MINI_GL,
      filter: { ...GL_CORE_32, extensions: ['GL_EXT_missing'] },
      generator: 'static',
      logger: new Logger({ component: 'glbindgen' }),
    });
    vi.restoreAllMocks();

    expect(entries).toEqual([
      expect.objectContaining({
        level: 'warn',
        component: 'glbindgen:resolver',
        event: 'unknown_extension',
      }),
      expect.objectContaining({ level: 'info', component: 'glbindgen', event: 'bindings_generated' }),
    ]);
  });

  it('rejects commands with unknown types', () => {
    const raw = new RawRegistry('gl', [], [rawCommand('GetMystery', 'GLmystery')]);

    expect(() => generateBindings({ registry: raw, filter: null, generator: 'static' })).toThrow(
      UnknownTypeError
    );
  });

  it('rejects emitted source that does not parse', () => {
    const raw = new RawRegistry('gl', [], [rawCommand('Bad-Name', 'void')]);

    expect(() => generateBindings({ registry: raw, filter: null, generator: 'static' })).toThrow(
      EmissionError
    );
  });

  it('skips verification when disabled', () => {
    const raw = new RawRegistry('gl', [], [rawCommand('Bad-Name', 'void')]);

    const result = generateBindings({ registry: raw, filter: null, generator: 'static', verify: false });

    expect(result.source).toContain('  function glBad-Name(): void;');
  });
});
