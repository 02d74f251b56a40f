import { describe, it, expect } from 'vitest';
import { UnresolvableSelectionError } from '../errors.js';
import { selectionToFilter, validateVersion } from './filter.js';

describe('selectionToFilter', () => {
  it('applies defaults to an empty selection', () => {
    expect(selectionToFilter({})).toEqual({
      namespace: 'gl',
      profile: 'core',
      version: '1.0',
      extensions: [],
    });
  });

  it('keeps the requested fields and removes duplicate extensions', () => {
    expect(
      selectionToFilter({
        namespace: 'gles2',
        profile: 'compatibility',
        version: '3.0',
        extensions: ['GL_OES_mapbuffer', 'GL_OES_mapbuffer', 'GL_EXT_debug_label'],
      })
    ).toEqual({
      namespace: 'gles2',
      profile: 'compatibility',
      version: '3.0',
      extensions: ['GL_OES_mapbuffer', 'GL_EXT_debug_label'],
    });
  });

  it('returns null in full mode', () => {
    expect(selectionToFilter({ namespace: 'egl', full: true })).toBeNull();
  });

  it('validates fields even in full mode', () => {
    expect(() => selectionToFilter({ namespace: 'vulkan', full: true })).toThrow(
      UnresolvableSelectionError
    );
  });

  it('rejects unknown profiles', () => {
    expect(() => selectionToFilter({ profile: 'es' })).toThrow(
      "Unknown profile 'es': expected one of [core, compatibility]"
    );
  });
});

describe('validateVersion', () => {
  it('returns the trimmed version', () => {
    expect(validateVersion(' 4.6 ')).toBe('4.6');
  });

  it('rejects malformed versions with the accepted formats', () => {
    expect(() => validateVersion('four')).toThrow(
      "Unknown version 'four': expected one of [<major>, <major>.<minor>]"
    );
  });
});
