/**
 * Spec Model
 *
 * Turns a parsed OpenAPI-like document (OpenAPI 3 or Swagger 2 shape) into a
 * read-only SpecDocument, and decides which of two documents is the
 * baseline by comparing their declared versions.
 */

import { z } from 'zod';
import {
  Endpoint,
  EndpointKey,
  HttpMethod,
  Parameter,
  ParameterLocation,
  ParameterType,
  ResolvedPair,
  Response,
  SpecDocument,
  SpecInput,
} from './types';
import { InvalidSpecError } from './errors';
import { compareSemver, parseSemver } from './semver';

// ─── Constants ──────────────────────────────────────────────────────────────

export const HTTP_METHODS: readonly HttpMethod[] = [
  'GET',
  'PUT',
  'POST',
  'DELETE',
  'OPTIONS',
  'HEAD',
  'PATCH',
  'TRACE',
];

const PARAMETER_TYPES: readonly ParameterType[] = [
  'string',
  'integer',
  'number',
  'boolean',
  'array',
  'object',
];

const STATUS_CODE_PATTERN = /^([1-5](\d\d|XX)|default)$/;

// ─── Document Shape ─────────────────────────────────────────────────────────

const VersionSchema = z.union([z.string(), z.number()]);

const DocumentSchema = z.object({
  info: z
    .object({
      version: VersionSchema.optional(),
      title: z.string().optional(),
    })
    .nullish(),
  version: VersionSchema.optional(),
  paths: z.record(z.record(z.unknown()).nullable()).nullish(),
  components: z
    .object({
      parameters: z.record(z.unknown()).nullish(),
    })
    .nullish(),
  parameters: z.record(z.unknown()).nullish(),
});

type RawDocument = z.infer<typeof DocumentSchema>;

const OperationSchema = z.object({
  parameters: z.array(z.unknown()).nullish(),
  responses: z.record(z.unknown()).nullish(),
});

const ParameterListSchema = z.array(z.unknown()).nullish();

const ParameterObjectSchema = z.object({
  name: z.string().min(1),
  in: z.enum(['query', 'header', 'path', 'cookie', 'body', 'formData']).default('query'),
  required: z.boolean().optional(),
  type: z.union([z.string(), z.array(z.string())]).optional(),
  schema: z
    .object({
      type: z.union([z.string(), z.array(z.string())]).optional(),
    })
    .nullish(),
});

// ─── Helpers ────────────────────────────────────────────────────────────────

export function endpointKey(method: string, path: string): EndpointKey {
  return `${method.toUpperCase()} ${path}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function toHttpMethod(key: string): HttpMethod | undefined {
  const upper = key.toUpperCase();
  return HTTP_METHODS.find((m) => m === upper);
}

function toParameterType(
  raw: string | string[] | undefined,
  name: string,
  source: string
): ParameterType | undefined {
  // OpenAPI 3.1 allows `type: [string, "null"]`
  const declared = Array.isArray(raw) ? raw.find((t) => t !== 'null') : raw;
  if (declared === undefined) return undefined;

  const type = PARAMETER_TYPES.find((t) => t === declared);
  if (!type) {
    throw new InvalidSpecError(source, `parameter "${name}" has unsupported type "${declared}"`);
  }
  return type;
}

/**
 * Follow a local `$ref` to a reusable parameter definition.
 * Cross-document references are rejected.
 */
function resolveParameterRef(
  entry: unknown,
  doc: RawDocument,
  source: string,
  seen: Set<string> = new Set()
): unknown {
  if (!isRecord(entry) || typeof entry.$ref !== 'string') return entry;

  const ref = entry.$ref;
  if (!ref.startsWith('#')) {
    throw new InvalidSpecError(source, `cross-document reference "${ref}" is not supported`);
  }
  if (seen.has(ref)) {
    throw new InvalidSpecError(source, `circular reference "${ref}"`);
  }
  seen.add(ref);

  const match = /^#\/(components\/parameters|parameters)\/(.+)$/.exec(ref);
  if (!match) {
    throw new InvalidSpecError(source, `unsupported parameter reference "${ref}"`);
  }

  // JSON pointer unescaping
  const name = match[2].replace(/~1/g, '/').replace(/~0/g, '~');
  const pool = match[1] === 'parameters' ? doc.parameters : doc.components?.parameters;
  const target = pool?.[name];
  if (target === undefined) {
    throw new InvalidSpecError(source, `unresolved reference "${ref}"`);
  }

  return resolveParameterRef(target, doc, source, seen);
}

function readParameters(
  entries: unknown,
  where: string,
  doc: RawDocument,
  source: string
): Parameter[] {
  const list = ParameterListSchema.safeParse(entries);
  if (!list.success) {
    throw new InvalidSpecError(source, `${where}: parameters must be a list`);
  }

  const seen = new Set<string>();
  const parameters: Parameter[] = [];

  (list.data ?? []).forEach((entry, i) => {
    const parsed = ParameterObjectSchema.safeParse(resolveParameterRef(entry, doc, source));
    if (!parsed.success) {
      throw new InvalidSpecError(
        source,
        `${where}[${i}]: malformed parameter (${describeIssues(parsed.error)})`
      );
    }

    const p = parsed.data;
    if (seen.has(p.name)) {
      throw new InvalidSpecError(source, `${where}: duplicate parameter "${p.name}"`);
    }
    seen.add(p.name);

    const location: ParameterLocation = p.in;
    parameters.push({
      name: p.name,
      location,
      // Path parameters are always required
      required: location === 'path' ? true : p.required ?? false,
      type: toParameterType(p.schema?.type ?? p.type, p.name, source),
    });
  });

  return parameters;
}

function readResponses(
  responses: Record<string, unknown> | null | undefined,
  where: string,
  source: string
): Map<string, Response> {
  const result = new Map<string, Response>();

  for (const code of Object.keys(responses ?? {})) {
    if (code.startsWith('x-')) continue; // vendor extension
    if (!STATUS_CODE_PATTERN.test(code)) {
      throw new InvalidSpecError(source, `${where}: invalid response status code "${code}"`);
    }
    result.set(code, { statusCode: code });
  }

  return result;
}

// ─── Build ──────────────────────────────────────────────────────────────────

/**
 * Build a SpecDocument from a parsed document.
 *
 * @param raw    - Parsed JSON/YAML value
 * @param source - File name used in error messages
 */
export function buildSpecDocument(raw: unknown, source: string): SpecDocument {
  if (!isRecord(raw)) {
    throw new InvalidSpecError(source, 'document root must be an object');
  }

  const parsed = DocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidSpecError(source, `malformed document (${describeIssues(parsed.error)})`);
  }
  const doc = parsed.data;

  const declaredVersion = doc.info?.version ?? doc.version;
  if (declaredVersion === undefined) {
    throw new InvalidSpecError(source, 'missing version (expected info.version or version)');
  }

  const endpoints = new Map<EndpointKey, Endpoint>();

  for (const [path, item] of Object.entries(doc.paths ?? {})) {
    if (!path.startsWith('/')) {
      throw new InvalidSpecError(source, `path "${path}" must start with "/"`);
    }
    if (item === null) continue;

    const shared = readParameters(item.parameters, `paths.${path}.parameters`, doc, source);

    for (const [key, value] of Object.entries(item)) {
      const method = toHttpMethod(key);
      if (!method) continue;

      const where = `paths.${path}.${key}`;
      const k = endpointKey(method, path);
      if (endpoints.has(k)) {
        throw new InvalidSpecError(source, `duplicate endpoint ${k}`);
      }

      const operation = OperationSchema.safeParse(value);
      if (!operation.success) {
        throw new InvalidSpecError(
          source,
          `${where}: malformed operation (${describeIssues(operation.error)})`
        );
      }

      // Operation-level parameters override path-level ones of the same name
      const parameters = new Map<string, Parameter>();
      for (const p of shared) parameters.set(p.name, p);
      for (const p of readParameters(operation.data.parameters, `${where}.parameters`, doc, source)) {
        parameters.set(p.name, p);
      }

      endpoints.set(k, {
        path,
        method,
        parameters,
        responses: readResponses(operation.data.responses, `${where}.responses`, source),
      });
    }
  }

  return {
    version: String(declaredVersion),
    title: doc.info?.title,
    endpoints,
  };
}

// ─── Baseline Resolution ────────────────────────────────────────────────────

/**
 * Decide which input is the baseline: the lower semantic version wins; on
 * equal precedence the file path that sorts first. Argument order never
 * matters.
 */
export function resolvePair(a: SpecInput, b: SpecInput): ResolvedPair {
  const va = parseSemver(a.document.version, a.file);
  const vb = parseSemver(b.document.version, b.file);

  let cmp = compareSemver(va, vb);
  if (cmp === 0) {
    cmp = a.file < b.file ? -1 : a.file > b.file ? 1 : 0;
  }

  return cmp <= 0 ? { baseline: a, candidate: b } : { baseline: b, candidate: a };
}
