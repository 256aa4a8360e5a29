/**
 * Rule Classifier
 *
 * Maps raw diff records onto the compatibility rule set, assigns each
 * violation its base severity and raises it when usage data shows the
 * endpoint is still called.
 */

import {
  BreakingRule,
  RawChange,
  RuleName,
  Severity,
  Violation,
  VersionEvidence,
} from './types';
import { UsageIndex } from './usage-index';

// ─── Severity Policy ────────────────────────────────────────────────────────

interface RulePolicy {
  severity: Severity;

  /** Whether observed traffic on the endpoint raises the severity */
  escalateOnUsage: boolean;
}

export const RULE_POLICY: Record<RuleName, RulePolicy> = {
  ENDPOINT_REMOVED: { severity: 'MEDIUM', escalateOnUsage: true },
  PARAM_REQUIRED_ADDED: { severity: 'HIGH', escalateOnUsage: false },
  PARAM_TYPE_CHANGED: { severity: 'HIGH', escalateOnUsage: false },
  RESPONSE_200_REMOVED: { severity: 'HIGH', escalateOnUsage: false },
  SEMVER_MISMATCH: { severity: 'HIGH', escalateOnUsage: false },
};

export const BREAKING_RULES: ReadonlySet<RuleName> = new Set<BreakingRule>([
  'ENDPOINT_REMOVED',
  'PARAM_REQUIRED_ADDED',
  'PARAM_TYPE_CHANGED',
  'RESPONSE_200_REMOVED',
]);

export const SEVERITY_ORDER: readonly Severity[] = ['LOW', 'MEDIUM', 'HIGH'];

export function severityRank(severity: Severity): number {
  return SEVERITY_ORDER.indexOf(severity);
}

/**
 * One level up when the endpoint was used, capped at HIGH.
 */
export function escalateSeverity(base: Severity, wasUsed: boolean): Severity {
  if (!wasUsed) return base;
  const next = Math.min(severityRank(base) + 1, SEVERITY_ORDER.length - 1);
  return SEVERITY_ORDER[next];
}

// ─── Classification ─────────────────────────────────────────────────────────

export interface ClassifyContext {
  evidence: VersionEvidence;
  usage: UsageIndex;

  /** Apply usage escalation (default: true) */
  escalateOnUsage?: boolean;
}

function severityFor(rule: RuleName, path: string, method: string, ctx: ClassifyContext): Severity {
  const policy = RULE_POLICY[rule];
  if (!policy.escalateOnUsage || ctx.escalateOnUsage === false) {
    return policy.severity;
  }
  return escalateSeverity(policy.severity, ctx.usage.wasUsed(path, method));
}

/**
 * Map one raw change to at most one violation.
 */
export function classifyChange(change: RawChange, ctx: ClassifyContext): Violation | null {
  const { path, method } = change;

  switch (change.kind) {
    case 'endpoint_removed':
      return {
        rule: 'ENDPOINT_REMOVED',
        path,
        method,
        message: `endpoint removed: ${method} ${path}`,
        severity: severityFor('ENDPOINT_REMOVED', path, method, ctx),
        object: { ...ctx.evidence, usage_count: ctx.usage.countFor(path, method) },
      };

    case 'param_added':
    case 'param_required_changed': {
      const becameRequired =
        change.kind === 'param_added' ? change.parameter.required : !change.before && change.after;
      if (!becameRequired) return null;

      const { name, location } = change.parameter;
      return {
        rule: 'PARAM_REQUIRED_ADDED',
        path,
        method,
        message: `required parameter added: ${name}`,
        severity: severityFor('PARAM_REQUIRED_ADDED', path, method, ctx),
        object: {
          ...ctx.evidence,
          parameter: name,
          location,
          previously: change.kind === 'param_added' ? 'absent' : 'optional',
        },
      };
    }

    case 'param_type_changed': {
      const { name, location } = change.parameter;
      return {
        rule: 'PARAM_TYPE_CHANGED',
        path,
        method,
        message: `parameter type changed: ${name} (${change.before} -> ${change.after})`,
        severity: severityFor('PARAM_TYPE_CHANGED', path, method, ctx),
        object: {
          ...ctx.evidence,
          parameter: name,
          location,
          old_type: change.before,
          new_type: change.after,
        },
      };
    }

    case 'response_removed':
      if (change.statusCode !== '200') return null;
      return {
        rule: 'RESPONSE_200_REMOVED',
        path,
        method,
        message: '200 response removed',
        severity: severityFor('RESPONSE_200_REMOVED', path, method, ctx),
        object: { ...ctx.evidence, status_code: change.statusCode },
      };

    default:
      return null;
  }
}

export function classifyChanges(changes: RawChange[], ctx: ClassifyContext): Violation[] {
  const violations: Violation[] = [];
  for (const change of changes) {
    const v = classifyChange(change, ctx);
    if (v) violations.push(v);
  }
  return violations;
}
