/**
 * api-change-guard
 *
 * Catch breaking API changes and under-bumped versions before they ship.
 *
 * @example
 * ```typescript
 * import { ChangeGuard } from 'api-change-guard';
 *
 * const guard = new ChangeGuard();
 *
 * // Either order works: the lower declared version is the baseline
 * const report = guard.analyzeFiles('openapi-v2.yaml', 'openapi-v1.yaml', 'access.ndjson');
 *
 * console.log(guard.format(report, 'json'));
 * ```
 */

// ─── Main API ───────────────────────────────────────────────────────────────
export { ChangeGuard, analyzeDocuments } from './guard';

// ─── Core Types ─────────────────────────────────────────────────────────────
export {
  ActualBump,
  BumpLevel,
  ChangeGuardOptions,
  ChangeReport,
  Endpoint,
  EndpointKey,
  HttpMethod,
  Parameter,
  ParameterLocation,
  ParameterType,
  RawChange,
  ReportFormat,
  ResolvedPair,
  Response,
  RuleName,
  Severity,
  SpecDocument,
  SpecInput,
  UsageRecord,
  VersionEvidence,
  Violation,
} from './core/types';

// ─── Errors ─────────────────────────────────────────────────────────────────
export { ChangeGuardError, InvalidSpecError, InvalidVersionError, LogParseError } from './core/errors';

// ─── Core Engines (for advanced usage) ──────────────────────────────────────
export { buildSpecDocument, resolvePair, endpointKey } from './core/spec-model';
export { parseSemver, compareSemver, bumpKind } from './core/semver';
export { UsageIndex } from './core/usage-index';
export { diffSpecs, diffEndpoint, isAdditive } from './core/differ';
export { classifyChanges, classifyChange, escalateSeverity, RULE_POLICY } from './core/classifier';
export { auditVersions, requiredBump } from './core/auditor';
export { formatReport, sortViolations } from './core/reporter';

// ─── Format Parsers ─────────────────────────────────────────────────────────
export { parseJson, isJson, parseYaml, parseUsageLog, autoParse } from './formats';
