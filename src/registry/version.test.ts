import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { compareVersions, formatVersion, tryParseVersion } from './version.js';

describe('version', () => {
  describe('tryParseVersion', () => {
    it('parses major.minor', () => {
      expect(tryParseVersion('4.5')).toEqual({ major: 4, minor: 5 });
    });

    it('treats a bare major as minor 0', () => {
      expect(tryParseVersion('2')).toEqual({ major: 2, minor: 0 });
    });

    it('ignores surrounding whitespace', () => {
      expect(tryParseVersion(' 3.2 ')).toEqual({ major: 3, minor: 2 });
    });

    it.each(['', 'latest', '4.', '.5', '4.5.1', '-1', 'v4.5'])('rejects %j', (text) => {
      expect(tryParseVersion(text)).toBeUndefined();
    });
  });

  describe('compareVersions', () => {
    it('orders by major, then minor', () => {
      expect(compareVersions({ major: 3, minor: 2 }, { major: 4, minor: 0 })).toBeLessThan(0);
      expect(compareVersions({ major: 4, minor: 6 }, { major: 4, minor: 5 })).toBeGreaterThan(0);
      expect(compareVersions({ major: 1, minor: 0 }, { major: 1, minor: 0 })).toBe(0);
    });

    it('compares minor numerically, not lexically', () => {
      expect(compareVersions({ major: 1, minor: 10 }, { major: 1, minor: 9 })).toBeGreaterThan(0);
    });

    it('is antisymmetric (property-based)', () => {
      const version = fc.record({ major: fc.nat(20), minor: fc.nat(20) });
      fc.assert(
        fc.property(version, version, (a, b) => {
          expect(Math.sign(compareVersions(a, b))).toBe(-Math.sign(compareVersions(b, a)));
        })
      );
    });
  });

  describe('formatVersion', () => {
    it('formats as major.minor', () => {
      expect(formatVersion({ major: 1, minor: 0 })).toBe('1.0');
    });

    it('parses back to the same version (property-based)', () => {
      fc.assert(
        fc.property(fc.record({ major: fc.nat(99), minor: fc.nat(99) }), (version) => {
          expect(tryParseVersion(formatVersion(version))).toEqual(version);
        })
      );
    });
  });
});
