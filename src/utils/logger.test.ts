import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger } from './logger.js';

describe('Logger', () => {
  let capturedOutput: string[] = [];
  let originalWrite: typeof process.stderr.write;

  beforeEach(() => {
    capturedOutput = [];
    originalWrite = process.stderr.write.bind(process.stderr);
    process.stderr.write = vi.fn((chunk: string | Uint8Array): boolean => {
      capturedOutput.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    }) as typeof process.stderr.write;
  });

  afterEach(() => {
    process.stderr.write = originalWrite;
  });

  function parseOutput(index: number): Record<string, unknown> {
    const output = capturedOutput[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return JSON.parse(output.trim()) as Record<string, unknown>;
  }

  describe('entries', () => {
    it('writes one JSON line per entry', () => {
      const logger = new Logger({ component: 'glbindgen' });

      logger.info('registry_read', { path: 'gl.xml', commands: 2 });

      expect(capturedOutput).toHaveLength(1);
      expect(capturedOutput[0]?.endsWith('\n')).toBe(true);
      const parsed = parseOutput(0);
      expect(parsed.level).toBe('info');
      expect(parsed.component).toBe('glbindgen');
      expect(parsed.event).toBe('registry_read');
      expect(parsed.data).toEqual({ path: 'gl.xml', commands: 2 });
      expect(parsed.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
    });

    it('omits data when none is given', () => {
      new Logger({ component: 'glbindgen' }).warn('unknown_extension');

      expect(parseOutput(0)).not.toHaveProperty('data');
      expect(parseOutput(0).level).toBe('warn');
    });

    it('writes errors at error level', () => {
      new Logger({ component: 'glbindgen' }).error('generation_failed', { code: 'UNKNOWN_TYPE' });

      expect(parseOutput(0).level).toBe('error');
      expect(parseOutput(0).data).toEqual({ code: 'UNKNOWN_TYPE' });
    });

    it('drops debug entries unless debug mode is on', () => {
      new Logger({ component: 'glbindgen' }).debug('registry_resolved');
      expect(capturedOutput).toHaveLength(0);

      new Logger({ component: 'glbindgen', debugMode: true }).debug('registry_resolved');
      expect(capturedOutput).toHaveLength(1);
      expect(parseOutput(0).level).toBe('debug');
    });
  });

  describe('child', () => {
    it('prefixes the component and keeps debug mode', () => {
      const child = new Logger({ component: 'glbindgen', debugMode: true }).child('resolver');

      child.debug('registry_resolved');

      expect(parseOutput(0).component).toBe('glbindgen:resolver');
    });
  });

  describe('unserializable data', () => {
    it('replaces circular data with a marker', () => {
      const circular: Record<string, unknown> = { name: 'test' };
      circular.self = circular;

      new Logger({ component: 'glbindgen' }).info('circular', circular);

      expect(capturedOutput).toHaveLength(1);
      const parsed = parseOutput(0);
      expect(parsed.event).toBe('circular');
      expect(typeof parsed.serializationError).toBe('string');
      expect(parsed.originalData).toBe('[unserializable]');
    });

    it('replaces bigint data with a marker', () => {
      new Logger({ component: 'glbindgen' }).info('bigint', { value: 1n });

      expect(parseOutput(0).originalData).toBe('[unserializable]');
    });

    it('always writes valid JSON (property-based)', () => {
      const logger = new Logger({ component: 'glbindgen' });

      fc.assert(
        fc.property(fc.dictionary(fc.string(), fc.anything()), (data) => {
          capturedOutput = [];
          logger.info('fuzz', data);

          expect(capturedOutput).toHaveLength(1);
          const parsed = parseOutput(0);
          expect(parsed.event).toBe('fuzz');
          if (parsed.serializationError !== undefined) {
            expect(parsed.originalData).toBe('[unserializable]');
          }
        })
      );
    });
  });
});
