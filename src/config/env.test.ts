import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeConfig,
  readEnvOverrides,
} from './env.js';
import { DEFAULT_CONFIG, parseConfig } from './index.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    it('should map GLBINDGEN_API to bindings.api', () => {
      const result = readEnvOverrides({ GLBINDGEN_API: 'egl' });

      expect(result.overrides.bindings?.api).toBe('egl');
      expect(result.appliedVars).toEqual(['GLBINDGEN_API']);
    });

    it('should read selection, path and policy variables', () => {
      const result = readEnvOverrides({
        GLBINDGEN_PROFILE: 'compatibility',
        GLBINDGEN_VERSION: ' 4.6 ',
        GLBINDGEN_GENERATOR: 'global',
        GLBINDGEN_REGISTRY: '/registry/gl.xml',
        GLBINDGEN_OUTPUT: '/out/gl.ts',
        GLBINDGEN_RUNTIME_MODULE: './runtime.js',
        GLBINDGEN_UNKNOWN_EXTENSIONS: 'error',
      });

      expect(result.overrides).toEqual({
        bindings: { profile: 'compatibility', version: '4.6', generator: 'global' },
        registry: { path: '/registry/gl.xml' },
        output: { path: '/out/gl.ts', runtime_module: './runtime.js' },
        resolver: { unknown_extensions: 'error' },
      });
    });

    it('should split GLBINDGEN_EXTENSIONS on commas and drop blanks', () => {
      const result = readEnvOverrides({ GLBINDGEN_EXTENSIONS: ' GL_EXT_a, ,GL_EXT_b,' });

      expect(result.overrides.bindings?.extensions).toEqual(['GL_EXT_a', 'GL_EXT_b']);
    });

    it('should coerce boolean variables', () => {
      const result = readEnvOverrides({
        GLBINDGEN_FULL: 'yes',
        GLBINDGEN_VERIFY: 'OFF',
        GLBINDGEN_DEBUG: '1',
      });

      expect(result.overrides.bindings?.full).toBe(true);
      expect(result.overrides.output?.verify).toBe(false);
      expect(result.overrides.logging?.debug).toBe(true);
    });

    it('should accept every boolean spelling in any case', () => {
      const spellings = fc.constantFrom('true', '1', 'yes', 'on', 'false', '0', 'no', 'off');
      fc.assert(
        fc.property(spellings, fc.boolean(), (spelling, upper) => {
          const value = upper ? spelling.toUpperCase() : spelling;
          const expected = ['true', '1', 'yes', 'on'].includes(spelling);

          expect(readEnvOverrides({ GLBINDGEN_DEBUG: value }).overrides.logging?.debug).toBe(expected);
        })
      );
    });

    it('should ignore unset and empty variables', () => {
      const result = readEnvOverrides({ GLBINDGEN_API: '', GLBINDGEN_DEBUG: undefined });

      expect(result.overrides).toEqual({});
      expect(result.appliedVars).toEqual([]);
    });

    it('should throw EnvCoercionError for invalid booleans', () => {
      expect(() => readEnvOverrides({ GLBINDGEN_FULL: 'maybe' })).toThrow(EnvCoercionError);
      expect(() => readEnvOverrides({ GLBINDGEN_FULL: 'maybe' })).toThrow(
        "Cannot coerce 'GLBINDGEN_FULL' value 'maybe' to boolean. Expected one of: true, 1, yes, on, false, 0, no, off"
      );
    });

    it('should collect coercion errors when asked', () => {
      const result = readEnvOverrides(
        { GLBINDGEN_FULL: 'maybe', GLBINDGEN_API: 'gles2' },
        { collectErrors: true }
      );

      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.envVar).toBe('GLBINDGEN_FULL');
      expect(result.overrides.bindings?.api).toBe('gles2');
    });
  });

  describe('applyEnvOverrides', () => {
    it('should let env values win over file values', () => {
      const fromFile = parseConfig('[bindings]\napi = "gles2"\nversion = "3.0"\n');

      const config = applyEnvOverrides(fromFile, { GLBINDGEN_API: 'gles1', GLBINDGEN_VERSION: '1.1' });

      expect(config.bindings.api).toBe('gles1');
      expect(config.bindings.version).toBe('1.1');
      expect(config.bindings.generator).toBe(DEFAULT_CONFIG.bindings.generator);
    });
  });

  describe('mergeConfig', () => {
    it('should merge section by section', () => {
      const merged = mergeConfig(DEFAULT_CONFIG, { output: { verify: false } });

      expect(merged.output).toEqual({ ...DEFAULT_CONFIG.output, verify: false });
      expect(merged.bindings).toEqual(DEFAULT_CONFIG.bindings);
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every variable with its type', () => {
      const docs = getEnvVarDocumentation();

      expect(Object.keys(docs)).toHaveLength(12);
      expect(docs.GLBINDGEN_EXTENSIONS?.type).toBe('list');
      expect(docs.GLBINDGEN_DEBUG?.type).toBe('boolean');
    });
  });
});
