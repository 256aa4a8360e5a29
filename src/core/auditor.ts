/**
 * Semver Auditor
 *
 * Derives the smallest version bump the detected changes require and checks
 * the candidate's declared version against it.
 */

import {
  ActualBump,
  BumpLevel,
  RawChange,
  SemverMismatchViolation,
  Violation,
  VersionEvidence,
} from './types';
import { BREAKING_RULES, RULE_POLICY } from './classifier';
import { isAdditive } from './differ';
import { bumpKind, parseSemver } from './semver';

const BUMP_RANK: Record<ActualBump, number> = {
  none: 0,
  patch: 1,
  minor: 2,
  major: 3,
};

/** Lowest actual bump rank that satisfies each requirement; patch-level sets need none */
const SATISFIED_AT: Record<BumpLevel, number> = {
  major: BUMP_RANK.major,
  minor: BUMP_RANK.minor,
  patch: BUMP_RANK.none,
};

/**
 * major if any breaking rule fired, minor if the surface grew, else patch.
 */
export function requiredBump(changes: RawChange[], violations: Violation[]): BumpLevel {
  if (violations.some((v) => BREAKING_RULES.has(v.rule))) return 'major';
  if (changes.some(isAdditive)) return 'minor';
  return 'patch';
}

export function isBumpSufficient(required: BumpLevel, actual: ActualBump): boolean {
  return BUMP_RANK[actual] >= SATISFIED_AT[required];
}

export interface AuditResult {
  requiredBump: BumpLevel;
  actualBump: ActualBump;
  violation: SemverMismatchViolation | null;
}

/**
 * Compare the required bump with the declared versions.
 * Over-bumping is always accepted.
 */
export function auditVersions(
  changes: RawChange[],
  violations: Violation[],
  evidence: VersionEvidence
): AuditResult {
  const required = requiredBump(changes, violations);
  const actual = bumpKind(
    parseSemver(evidence.baseline_version, evidence.baseline_file),
    parseSemver(evidence.candidate_version, evidence.candidate_file)
  );

  if (isBumpSufficient(required, actual)) {
    return { requiredBump: required, actualBump: actual, violation: null };
  }

  return {
    requiredBump: required,
    actualBump: actual,
    violation: {
      rule: 'SEMVER_MISMATCH',
      path: '',
      method: '',
      message: actual === 'none' ? `expected ${required}` : `expected ${required} got ${actual}`,
      severity: RULE_POLICY.SEMVER_MISMATCH.severity,
      object: { ...evidence, required_bump: required, actual_bump: actual },
    },
  };
}
