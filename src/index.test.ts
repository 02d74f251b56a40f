import { describe, it, expect } from 'vitest';
import {
  BindingTable,
  GENERATOR_NAMES,
  NAMESPACES,
  VERSION,
  generateBindings,
  parseRegistryRecords,
} from './index.js';

describe('glbindgen', () => {
  describe('VERSION', () => {
    it('follows semver format', () => {
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    });

    it('matches package version', () => {
      expect(VERSION).toBe('0.1.0');
    });
  });

  describe('public API', () => {
    it('exposes the supported namespaces and styles', () => {
      expect(NAMESPACES).toEqual(['gl', 'gles1', 'gles2', 'glx', 'wgl', 'egl']);
      expect(GENERATOR_NAMES).toEqual(['global', 'struct', 'static_struct', 'static']);
    });

    it('exposes the pipeline and runtime', () => {
      expect(typeof generateBindings).toBe('function');
      expect(typeof parseRegistryRecords).toBe('function');
      expect(typeof BindingTable).toBe('function');
    });
  });
});
