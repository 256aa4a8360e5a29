/**
 * Spec Diff Engine
 *
 * Compares two SpecDocuments and produces a list of RawChange records
 * describing every endpoint, parameter and response difference between them.
 * Changes come out in a stable order: endpoints by key, then parameters by
 * name, then responses by status code.
 */

import { Endpoint, RawChange, SpecDocument } from './types';

// ─── Helpers ────────────────────────────────────────────────────────────────

function sortedKeys<K extends string>(...maps: ReadonlyMap<K, unknown>[]): K[] {
  const keys = new Set<K>();
  for (const m of maps) {
    for (const k of m.keys()) keys.add(k);
  }
  return [...keys].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

// ─── Endpoint Diff ──────────────────────────────────────────────────────────

/**
 * Compare the parameters and responses of one endpoint present on both sides.
 */
export function diffEndpoint(before: Endpoint, after: Endpoint): RawChange[] {
  const changes: RawChange[] = [];
  const { path, method } = after;

  // Parameters
  for (const name of sortedKeys(before.parameters, after.parameters)) {
    const b = before.parameters.get(name);
    const a = after.parameters.get(name);

    if (b && !a) {
      changes.push({ kind: 'param_removed', path, method, parameter: b });
      continue;
    }
    if (!b && a) {
      changes.push({ kind: 'param_added', path, method, parameter: a });
      continue;
    }
    if (!b || !a) continue;

    if (b.required !== a.required) {
      changes.push({
        kind: 'param_required_changed',
        path,
        method,
        parameter: a,
        before: b.required,
        after: a.required,
      });
    }

    // Types are only comparable when both sides declare one
    if (b.type && a.type && b.type !== a.type) {
      changes.push({
        kind: 'param_type_changed',
        path,
        method,
        parameter: a,
        before: b.type,
        after: a.type,
      });
    }
  }

  // Responses
  for (const code of sortedKeys(before.responses, after.responses)) {
    const inBefore = before.responses.has(code);
    const inAfter = after.responses.has(code);

    if (inBefore && !inAfter) {
      changes.push({ kind: 'response_removed', path, method, statusCode: code });
    } else if (!inBefore && inAfter) {
      changes.push({ kind: 'response_added', path, method, statusCode: code });
    }
  }

  return changes;
}

// ─── Main Diff ──────────────────────────────────────────────────────────────

/**
 * Compare two API documents and return all detected changes.
 *
 * @param baseline  - The older document
 * @param candidate - The newer document
 */
export function diffSpecs(baseline: SpecDocument, candidate: SpecDocument): RawChange[] {
  const changes: RawChange[] = [];

  for (const key of sortedKeys(baseline.endpoints, candidate.endpoints)) {
    const before = baseline.endpoints.get(key);
    const after = candidate.endpoints.get(key);

    if (before && after) {
      changes.push(...diffEndpoint(before, after));
    } else if (before) {
      changes.push({ kind: 'endpoint_removed', path: before.path, method: before.method });
    } else if (after) {
      changes.push({ kind: 'endpoint_added', path: after.path, method: after.method });
    }
  }

  return changes;
}

/**
 * True when a change extends the API surface without invalidating clients:
 * a new endpoint, a new optional parameter, a new response code, or a
 * required parameter that became optional.
 */
export function isAdditive(change: RawChange): boolean {
  switch (change.kind) {
    case 'endpoint_added':
    case 'response_added':
      return true;
    case 'param_added':
      return !change.parameter.required;
    case 'param_required_changed':
      return change.before && !change.after;
    default:
      return false;
  }
}
