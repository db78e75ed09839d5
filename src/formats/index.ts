/**
 * Format parsers: barrel export
 */

export { parseYaml, isYamlFileName } from './yaml';

import { parseYaml } from './yaml';

/**
 * Parse document text. A '.json' file must be strict JSON; anything else goes
 * through the YAML parser, which also reads JSON.
 */
export function parseDocumentText(input: string, fileName?: string): unknown {
  if (fileName !== undefined && /\.json$/i.test(fileName)) {
    return parseStrictJson(input);
  }
  return parseYaml(input);
}

function parseStrictJson(input: string): unknown {
  try {
    return JSON.parse(input.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new Error(
      `Failed to parse JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
