/**
 * Usage-log Parser
 *
 * Accepts either a JSON array of records or newline-delimited JSON (one
 * record per line). Each record names a path and method and may carry a
 * pre-aggregated `count`; without one it stands for a single call.
 */

import { z } from 'zod';
import { UsageRecord } from '../core/types';
import { LogParseError } from '../core/errors';
import { parseJson } from './json';

const UsageRecordSchema = z.object({
  path: z.string().min(1),
  method: z.string().min(1),
  count: z.number().int().nonnegative().default(1),
});

function toRecord(value: unknown, where: string, source: string): UsageRecord {
  const parsed = UsageRecordSchema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(record)'}: ${issue.message}`)
      .join('; ');
    throw new LogParseError(source, `${where}: ${detail}`);
  }
  return parsed.data;
}

/**
 * Parse usage-log content into records.
 *
 * @param content - File content
 * @param source  - File name used in error messages
 */
export function parseUsageLog(content: string, source: string): UsageRecord[] {
  const trimmed = content.trim();
  if (trimmed.length === 0) return [];

  if (trimmed.startsWith('[')) {
    let parsed: unknown;
    try {
      parsed = parseJson(trimmed);
    } catch (error) {
      throw new LogParseError(source, error instanceof Error ? error.message : String(error));
    }
    if (!Array.isArray(parsed)) {
      throw new LogParseError(source, 'expected a JSON array of records');
    }
    return parsed.map((entry, i) => toRecord(entry, `record ${i}`, source));
  }

  const records: UsageRecord[] = [];
  const lines = trimmed.split(/\r?\n/);

  lines.forEach((line, i) => {
    if (line.trim().length === 0) return;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      throw new LogParseError(
        source,
        `line ${i + 1}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    records.push(toRecord(parsed, `line ${i + 1}`, source));
  });

  return records;
}
