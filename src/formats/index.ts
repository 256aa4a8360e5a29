/**
 * Format Parsers: barrel export
 */

export { parseJson, isJson } from './json';
export { parseYaml, isYamlFile } from './yaml';
export { parseUsageLog } from './usage-log';

/**
 * Parse a document by file extension, or by sniffing the content when the
 * extension says nothing. YAML is tried last since it accepts almost anything.
 */
import { isJson, parseJson } from './json';
import { isYamlFile, parseYaml } from './yaml';

export function autoParse(input: string, fileName = ''): unknown {
  if (/\.json$/i.test(fileName)) {
    return parseJson(input);
  }

  if (isYamlFile(fileName)) {
    return parseYaml(input);
  }

  if (isJson(input)) {
    return parseJson(input);
  }

  return parseYaml(input);
}
