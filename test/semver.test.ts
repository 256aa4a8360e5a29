/**
 * Tests for semantic version handling
 */

import { bumpKind, compareSemver, parseSemver } from '../src/core/semver';
import { InvalidVersionError } from '../src/core/errors';

const cmp = (a: string, b: string) => compareSemver(parseSemver(a), parseSemver(b));
const bump = (a: string, b: string) => bumpKind(parseSemver(a), parseSemver(b));

describe('Semver', () => {
  describe('parseSemver', () => {
    test('parses a plain version', () => {
      expect(parseSemver('1.2.3')).toMatchObject({ major: 1, minor: 2, patch: 3, prerelease: [] });
    });

    test('accepts a leading v, prerelease and build metadata', () => {
      expect(parseSemver('v2.0.0-rc.1+build.5')).toMatchObject({
        major: 2,
        minor: 0,
        patch: 0,
        prerelease: ['rc', 1],
        build: ['build', '5'],
      });
    });

    test('throws InvalidVersionError for incomplete or non-numeric versions', () => {
      expect(() => parseSemver('1.2')).toThrow(InvalidVersionError);
      expect(() => parseSemver('release-two')).toThrow(InvalidVersionError);
      expect(() => parseSemver('')).toThrow(InvalidVersionError);
    });

    test('names the source file in the error', () => {
      expect(() => parseSemver('1.x', 'api.yaml')).toThrow('api.yaml: Invalid semver version: "1.x"');
    });

    test('rejects leading zeros', () => {
      expect(() => parseSemver('01.2.3')).toThrow(InvalidVersionError);
      expect(() => parseSemver('1.0.0-01')).toThrow(InvalidVersionError);
    });

    test('rejects components beyond the safe integer range', () => {
      expect(() => parseSemver('99999999999999999999.0.0')).toThrow(InvalidVersionError);
    });
  });

  describe('compareSemver', () => {
    test('compares core components numerically', () => {
      expect(cmp('1.2.0', '1.10.0')).toBe(-1);
      expect(cmp('2.0.0', '1.99.99')).toBe(1);
      expect(cmp('1.2.3', '1.2.3')).toBe(0);
    });

    test('a release outranks its prereleases', () => {
      expect(cmp('1.0.0-alpha', '1.0.0')).toBe(-1);
      expect(cmp('1.0.0', '1.0.0-rc.1')).toBe(1);
    });

    test('orders prerelease identifiers', () => {
      expect(cmp('1.0.0-alpha', '1.0.0-alpha.1')).toBe(-1);
      expect(cmp('1.0.0-alpha.1', '1.0.0-alpha.beta')).toBe(-1);
      expect(cmp('1.0.0-beta.2', '1.0.0-beta.11')).toBe(-1);
      expect(cmp('1.0.0-beta', '1.0.0-alpha')).toBe(1);
    });

    test('ignores build metadata', () => {
      expect(cmp('1.0.0+a', '1.0.0+b')).toBe(0);
    });
  });

  describe('bumpKind', () => {
    test('reports the highest component that increased', () => {
      expect(bump('1.2.0', '2.0.0')).toBe('major');
      expect(bump('1.9.9', '2.0.0')).toBe('major');
      expect(bump('1.2.0', '1.3.0')).toBe('minor');
      expect(bump('1.2.0', '1.2.1')).toBe('patch');
    });

    test('equal cores are no bump', () => {
      expect(bump('1.2.0', '1.2.0')).toBe('none');
      expect(bump('1.0.0-rc.1', '1.0.0')).toBe('none');
    });
  });
});
