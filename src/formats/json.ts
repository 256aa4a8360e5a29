/**
 * JSON Parser
 *
 * Strict JSON: trailing commas, comments and duplicate object keys are all
 * rejected. `JSON.parse` checks the syntax but keeps the last of duplicate
 * keys, so the value itself is read by the YAML parser, whose JSON-compatible
 * flow syntax fails on a repeated key.
 */

import { parse } from 'yaml';

function stripBom(input: string): string {
  return input.charCodeAt(0) === 0xfeff ? input.slice(1) : input;
}

export function parseJson(input: string): unknown {
  const text = stripBom(input);
  try {
    JSON.parse(text);
    return parse(text);
  } catch (error) {
    throw new Error(
      `Failed to parse JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Whether content looks like a JSON object or array.
 */
export function isJson(input: string): boolean {
  const trimmed = stripBom(input).trim();
  return /^\{[\s\S]*\}$|^\[[\s\S]*\]$/.test(trimmed);
}
