/**
 * Builders for in-memory API documents used across tests.
 */

import { buildSpecDocument } from '../src/core/spec-model';
import { SpecInput } from '../src/core/types';

export interface OperationShape {
  parameters?: unknown[];
  responses?: Record<string, unknown>;
}

export type PathsShape = Record<string, Record<string, OperationShape | unknown[]>>;

export const OK = { '200': { description: 'OK' } };

export function specInput(file: string, version: string, paths: PathsShape): SpecInput {
  return {
    file,
    document: buildSpecDocument({ openapi: '3.0.3', info: { title: 'Test API', version }, paths }, file),
  };
}

export function query(name: string, type: string, required = false): Record<string, unknown> {
  return { name, in: 'query', required, schema: { type } };
}
