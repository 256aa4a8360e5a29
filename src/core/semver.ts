/**
 * Semantic version parsing, precedence and bump detection.
 */

import semver, { SemVer } from 'semver';
import { ActualBump } from './types';
import { InvalidVersionError } from './errors';

/**
 * Parse a strict semantic version. A leading `v` is tolerated; leading zeros,
 * missing components and components beyond the safe integer range are not.
 */
export function parseSemver(v: string, source?: string): SemVer {
  const parsed = semver.parse(v.trim());
  if (!parsed) {
    throw new InvalidVersionError(v, source);
  }
  return parsed;
}

/**
 * Semver precedence. Build metadata is ignored.
 */
export function compareSemver(a: SemVer, b: SemVer): -1 | 0 | 1 {
  return semver.compare(a, b);
}

/**
 * The highest core component that increased from `from` to `to`.
 * Equal cores (including prerelease-only changes) count as no bump.
 */
export function bumpKind(from: SemVer, to: SemVer): ActualBump {
  if (to.major !== from.major) return to.major > from.major ? 'major' : 'none';
  if (to.minor !== from.minor) return to.minor > from.minor ? 'minor' : 'none';
  if (to.patch > from.patch) return 'patch';
  return 'none';
}
