/**
 * Canonical type definitions for api-change-guard.
 * These types represent the in-memory API model, the raw diff records and
 * the violations reported for a baseline/candidate pair.
 */

// ─── Spec Model ─────────────────────────────────────────────────────────────

export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'DELETE' | 'OPTIONS' | 'HEAD' | 'PATCH' | 'TRACE';

export type ParameterType = 'string' | 'integer' | 'number' | 'boolean' | 'array' | 'object';

export type ParameterLocation = 'query' | 'header' | 'path' | 'cookie' | 'body' | 'formData';

/** `"<METHOD> <path>"`, e.g. `"GET /orders/{id}"` */
export type EndpointKey = string;

export interface Parameter {
  name: string;

  /** Where the parameter travels (OpenAPI `in`) */
  location: ParameterLocation;

  required: boolean;

  /** Declared type tag; undefined when the document does not declare one */
  type?: ParameterType;
}

export interface Response {
  /** Status code as written in the document ("200", "4XX", "default") */
  statusCode: string;
}

export interface Endpoint {
  path: string;
  method: HttpMethod;
  parameters: ReadonlyMap<string, Parameter>;
  responses: ReadonlyMap<string, Response>;
}

export interface SpecDocument {
  /** Declared version string, as written */
  version: string;

  /** Optional `info.title` */
  title?: string;

  endpoints: ReadonlyMap<EndpointKey, Endpoint>;
}

/** A SpecDocument together with the file it was loaded from */
export interface SpecInput {
  file: string;
  document: SpecDocument;
}

export interface ResolvedPair {
  baseline: SpecInput;
  candidate: SpecInput;
}

// ─── Usage ──────────────────────────────────────────────────────────────────

export interface UsageRecord {
  path: string;
  method: string;
  count: number;
}

// ─── Raw Changes ────────────────────────────────────────────────────────────

interface EndpointRef {
  path: string;
  method: HttpMethod;
}

export type RawChange =
  | (EndpointRef & { kind: 'endpoint_added' })
  | (EndpointRef & { kind: 'endpoint_removed' })
  | (EndpointRef & { kind: 'param_added'; parameter: Parameter })
  | (EndpointRef & { kind: 'param_removed'; parameter: Parameter })
  | (EndpointRef & {
      kind: 'param_required_changed';
      parameter: Parameter;
      before: boolean;
      after: boolean;
    })
  | (EndpointRef & {
      kind: 'param_type_changed';
      parameter: Parameter;
      before: ParameterType;
      after: ParameterType;
    })
  | (EndpointRef & { kind: 'response_added'; statusCode: string })
  | (EndpointRef & { kind: 'response_removed'; statusCode: string });

export type RawChangeKind = RawChange['kind'];

// ─── Violations ─────────────────────────────────────────────────────────────

export type Severity = 'LOW' | 'MEDIUM' | 'HIGH';

export type RuleName =
  | 'ENDPOINT_REMOVED'
  | 'PARAM_REQUIRED_ADDED'
  | 'PARAM_TYPE_CHANGED'
  | 'RESPONSE_200_REMOVED'
  | 'SEMVER_MISMATCH';

export type BreakingRule = Exclude<RuleName, 'SEMVER_MISMATCH'>;

export type BumpLevel = 'major' | 'minor' | 'patch';

export type ActualBump = BumpLevel | 'none';

/** Identifiers every violation carries in its evidence bag */
export interface VersionEvidence {
  baseline_file: string;
  candidate_file: string;
  baseline_version: string;
  candidate_version: string;
}

interface ViolationBase<R extends RuleName, O> {
  rule: R;

  /** Affected path; empty for document-level rules */
  path: string;

  /** Uppercase HTTP verb; empty for document-level rules */
  method: string;

  message: string;
  severity: Severity;
  object: VersionEvidence & O;
}

export type EndpointRemovedViolation = ViolationBase<'ENDPOINT_REMOVED', { usage_count: number }>;

export type ParamRequiredAddedViolation = ViolationBase<
  'PARAM_REQUIRED_ADDED',
  { parameter: string; location: ParameterLocation; previously: 'absent' | 'optional' }
>;

export type ParamTypeChangedViolation = ViolationBase<
  'PARAM_TYPE_CHANGED',
  { parameter: string; location: ParameterLocation; old_type: ParameterType; new_type: ParameterType }
>;

export type Response200RemovedViolation = ViolationBase<'RESPONSE_200_REMOVED', { status_code: string }>;

export type SemverMismatchViolation = ViolationBase<
  'SEMVER_MISMATCH',
  { required_bump: BumpLevel; actual_bump: ActualBump }
>;

export type Violation =
  | EndpointRemovedViolation
  | ParamRequiredAddedViolation
  | ParamTypeChangedViolation
  | Response200RemovedViolation
  | SemverMismatchViolation;

// ─── Report ─────────────────────────────────────────────────────────────────

export interface ChangeReport {
  baseline: { file: string; version: string };
  candidate: { file: string; version: string };

  /** Sorted violations */
  violations: Violation[];

  requiredBump: BumpLevel;
  actualBump: ActualBump;

  summary: Record<Severity, number> & { total: number };
}

export type ReportFormat = 'json' | 'console' | 'markdown';

// ─── Guard Options ──────────────────────────────────────────────────────────

export interface ChangeGuardOptions {
  /** Raise the severity of removed endpoints that real traffic still hits (default: true) */
  escalateOnUsage?: boolean;

  /** Receives progress lines while analyzing (the CLI wires this to --verbose) */
  onLog?: (line: string) => void;
}
