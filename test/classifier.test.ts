/**
 * Tests for the Rule Classifier
 */

import { classifyChange, classifyChanges, escalateSeverity } from '../src/core/classifier';
import { UsageIndex } from '../src/core/usage-index';
import { Parameter, RawChange, VersionEvidence } from '../src/core/types';

const evidence: VersionEvidence = {
  baseline_file: 'v1.yaml',
  candidate_file: 'v2.yaml',
  baseline_version: '1.0.0',
  candidate_version: '1.1.0',
};

const limit: Parameter = { name: 'limit', location: 'query', required: true, type: 'integer' };

const removed: RawChange = { kind: 'endpoint_removed', path: '/orders', method: 'GET' };

describe('Rule Classifier', () => {
  // ─── Escalation ───────────────────────────────────────────────────────

  describe('escalateSeverity', () => {
    test('leaves severity alone without usage', () => {
      expect(escalateSeverity('LOW', false)).toBe('LOW');
      expect(escalateSeverity('MEDIUM', false)).toBe('MEDIUM');
    });

    test('raises one level with usage, capped at HIGH', () => {
      expect(escalateSeverity('LOW', true)).toBe('MEDIUM');
      expect(escalateSeverity('MEDIUM', true)).toBe('HIGH');
      expect(escalateSeverity('HIGH', true)).toBe('HIGH');
    });
  });

  // ─── ENDPOINT_REMOVED ─────────────────────────────────────────────────

  describe('ENDPOINT_REMOVED', () => {
    test('is MEDIUM when the endpoint was not used', () => {
      const v = classifyChange(removed, { evidence, usage: UsageIndex.empty() });

      expect(v).toEqual({
        rule: 'ENDPOINT_REMOVED',
        path: '/orders',
        method: 'GET',
        message: 'endpoint removed: GET /orders',
        severity: 'MEDIUM',
        object: { ...evidence, usage_count: 0 },
      });
    });

    test('escalates to HIGH when the usage log shows calls', () => {
      const usage = UsageIndex.fromRecords([{ path: '/orders', method: 'GET', count: 7 }]);
      const v = classifyChange(removed, { evidence, usage });

      expect(v?.severity).toBe('HIGH');
      expect(v?.object).toEqual({ ...evidence, usage_count: 7 });
    });

    test('stays MEDIUM when escalation is disabled', () => {
      const usage = UsageIndex.fromRecords([{ path: '/orders', method: 'GET', count: 7 }]);
      const v = classifyChange(removed, { evidence, usage, escalateOnUsage: false });
      expect(v?.severity).toBe('MEDIUM');
    });
  });

  // ─── PARAM_REQUIRED_ADDED ─────────────────────────────────────────────

  describe('PARAM_REQUIRED_ADDED', () => {
    test('fires for a new required parameter', () => {
      const v = classifyChange(
        { kind: 'param_added', path: '/orders', method: 'GET', parameter: limit },
        { evidence, usage: UsageIndex.empty() }
      );

      expect(v).toEqual({
        rule: 'PARAM_REQUIRED_ADDED',
        path: '/orders',
        method: 'GET',
        message: 'required parameter added: limit',
        severity: 'HIGH',
        object: { ...evidence, parameter: 'limit', location: 'query', previously: 'absent' },
      });
    });

    test('fires for an optional parameter becoming required', () => {
      const v = classifyChange(
        {
          kind: 'param_required_changed',
          path: '/orders',
          method: 'GET',
          parameter: limit,
          before: false,
          after: true,
        },
        { evidence, usage: UsageIndex.empty() }
      );

      expect(v?.rule).toBe('PARAM_REQUIRED_ADDED');
      expect(v?.object).toMatchObject({ previously: 'optional' });
    });

    test('does not fire for optional additions or relaxed parameters', () => {
      const ctx = { evidence, usage: UsageIndex.empty() };
      const optional = { ...limit, required: false };

      expect(
        classifyChange({ kind: 'param_added', path: '/orders', method: 'GET', parameter: optional }, ctx)
      ).toBeNull();
      expect(
        classifyChange(
          {
            kind: 'param_required_changed',
            path: '/orders',
            method: 'GET',
            parameter: optional,
            before: true,
            after: false,
          },
          ctx
        )
      ).toBeNull();
    });
  });

  // ─── PARAM_TYPE_CHANGED ───────────────────────────────────────────────

  test('PARAM_TYPE_CHANGED carries old and new types', () => {
    const v = classifyChange(
      {
        kind: 'param_type_changed',
        path: '/orders',
        method: 'GET',
        parameter: { ...limit, type: 'string' },
        before: 'integer',
        after: 'string',
      },
      { evidence, usage: UsageIndex.empty() }
    );

    expect(v).toEqual({
      rule: 'PARAM_TYPE_CHANGED',
      path: '/orders',
      method: 'GET',
      message: 'parameter type changed: limit (integer -> string)',
      severity: 'HIGH',
      object: { ...evidence, parameter: 'limit', location: 'query', old_type: 'integer', new_type: 'string' },
    });
  });

  // ─── RESPONSE_200_REMOVED ─────────────────────────────────────────────

  describe('RESPONSE_200_REMOVED', () => {
    test('fires only for the 200 response', () => {
      const ctx = { evidence, usage: UsageIndex.empty() };

      expect(
        classifyChange({ kind: 'response_removed', path: '/orders', method: 'GET', statusCode: '200' }, ctx)
      ).toEqual({
        rule: 'RESPONSE_200_REMOVED',
        path: '/orders',
        method: 'GET',
        message: '200 response removed',
        severity: 'HIGH',
        object: { ...evidence, status_code: '200' },
      });

      expect(
        classifyChange({ kind: 'response_removed', path: '/orders', method: 'GET', statusCode: '404' }, ctx)
      ).toBeNull();
    });
  });

  // ─── Batch ────────────────────────────────────────────────────────────

  test('classifyChanges yields one violation per triggering change', () => {
    const changes: RawChange[] = [
      removed,
      { kind: 'endpoint_added', path: '/v2/orders', method: 'GET' },
      { kind: 'response_added', path: '/health', method: 'GET', statusCode: '503' },
      { kind: 'response_removed', path: '/health', method: 'GET', statusCode: '200' },
      { kind: 'param_removed', path: '/health', method: 'GET', parameter: limit },
    ];

    const violations = classifyChanges(changes, { evidence, usage: UsageIndex.empty() });
    expect(violations.map((v) => v.rule)).toEqual(['ENDPOINT_REMOVED', 'RESPONSE_200_REMOVED']);
  });
});
