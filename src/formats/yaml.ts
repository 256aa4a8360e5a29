/**
 * YAML Parser
 *
 * OpenAPI documents are most often written in YAML. Duplicate mapping keys
 * are rejected by the parser.
 */

import { parse } from 'yaml';

export function parseYaml(input: string): unknown {
  try {
    return parse(input);
  } catch (error) {
    throw new Error(
      `Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

export function isYamlFile(fileName: string): boolean {
  return /\.ya?ml$/i.test(fileName);
}
