import { describe, it, expect } from 'vitest';
import { readFixture } from '../../tests/helpers/fixtures.js';
import { MalformedInputError } from '../errors.js';
import { parseRegistryRecords } from './records.js';

describe('parseRegistryRecords', () => {
  describe('fixture document', () => {
    const raw = parseRegistryRecords(readFixture('mini-egl.toml'));

    it('reads the namespace and extensions', () => {
      expect(raw.namespace()).toBe('egl');
      expect([...raw.extensions()]).toEqual(['EGL_KHR_fence_sync', 'EGL_KHR_reusable_sync']);
    });

    it('reads enum records', () => {
      expect(raw.enums().map((record) => record.identifier)).toEqual([
        'FALSE',
        'TRUE',
        'DONT_CARE',
        'FOREVER_KHR',
      ]);
      expect(raw.enums()[2]).toEqual({
        identifier: 'DONT_CARE',
        value: 'EGL_CAST(EGLint,-1)',
        typeOverride: 'EGLint',
        introducedIn: { major: 1, minor: 0 },
        removedIn: [],
        extension: undefined,
        profile: undefined,
      });
      expect(raw.enums()[3]?.extension).toBe('EGL_KHR_reusable_sync');
      expect(raw.enums()[3]?.introducedIn).toBeUndefined();
    });

    it('reads command records', () => {
      const [getError, initialize, createSync] = raw.commands();

      expect(getError).toEqual({
        identifier: 'GetError',
        params: [],
        returns: { identifier: '', typeName: 'EGLint', group: undefined, len: undefined },
        isSafe: true,
        alias: undefined,
        introducedIn: { major: 1, minor: 0 },
        removedIn: [],
        extension: undefined,
        profile: undefined,
      });
      expect(initialize?.params.map((param) => param.typeName)).toEqual([
        'EGLDisplay',
        'EGLint *',
        'EGLint *',
      ]);
      expect(createSync?.params[2]?.len).toBe('attrib_list');
      expect(createSync?.extension).toBe('EGL_KHR_fence_sync');
    });
  });

  it('defaults extensions to the names the records reference', () => {
    const raw = parseRegistryRecords(`
namespace = "gl"

[[enums]]
identifier = "TEXTURE_MAX_ANISOTROPY_EXT"
value = "0x84FE"
extension = "GL_EXT_texture_filter_anisotropic"
`);

    expect([...raw.extensions()]).toEqual(['GL_EXT_texture_filter_anisotropic']);
    expect(raw.commands()).toEqual([]);
  });

  it('reads removals', () => {
    const raw = parseRegistryRecords(`
namespace = "gl"

[[enums]]
identifier = "CURRENT_COLOR"
value = "0x0B00"
introduced_in = "1.0"
removed_in = [{ version = "3.2", profile = "core" }]
`);

    expect(raw.enums()[0]?.removedIn).toEqual([{ version: { major: 3, minor: 2 }, profile: 'core' }]);
  });

  describe('errors', () => {
    it('rejects invalid TOML', () => {
      expect(() => parseRegistryRecords('namespace = ')).toThrow(MalformedInputError);
    });

    it('requires a namespace', () => {
      expect(() => parseRegistryRecords('extensions = []')).toThrow(
        "Malformed record 'document': field 'namespace': expected string, got undefined"
      );
    });

    it('rejects unknown namespaces', () => {
      expect(() => parseRegistryRecords('namespace = "vk"')).toThrow(
        "Malformed record 'document': field 'namespace': unknown namespace 'vk'"
      );
    });

    it('names records without an identifier by position', () => {
      expect(() => parseRegistryRecords('namespace = "gl"\n[[enums]]\nvalue = "1"\n')).toThrow(
        "Malformed record 'enums[0]': field 'identifier': expected string, got undefined"
      );
    });

    it('requires is_safe on commands', () => {
      const toml = 'namespace = "gl"\n[[commands]]\nidentifier = "Clear"\nreturn = { type_name = "void" }\n';

      expect(() => parseRegistryRecords(toml)).toThrow(
        "Malformed record 'Clear': field 'is_safe': expected boolean, got undefined"
      );
    });

    it('requires a return table on commands', () => {
      const toml = 'namespace = "gl"\n[[commands]]\nidentifier = "Clear"\nis_safe = true\n';

      expect(() => parseRegistryRecords(toml)).toThrow(
        "Malformed record 'Clear': field 'return': expected a table"
      );
    });

    it('rejects malformed versions', () => {
      const toml = 'namespace = "gl"\n[[enums]]\nidentifier = "ONE"\nvalue = "1"\nintroduced_in = "one"\n';

      expect(() => parseRegistryRecords(toml)).toThrow(
        "Malformed record 'ONE': field 'introduced_in': 'one' is not a version"
      );
    });

    it('rejects unknown removal profiles', () => {
      const toml =
        'namespace = "gl"\n[[enums]]\nidentifier = "ONE"\nvalue = "1"\nremoved_in = [{ version = "3.2", profile = "es" }]\n';

      expect(() => parseRegistryRecords(toml)).toThrow(
        "Malformed record 'ONE': field 'profile': unknown profile 'es'"
      );
    });
  });
});
