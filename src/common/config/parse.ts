// src/common/config/parse.ts
import YAML from 'yaml';

/**
 * Parse configuration text based on file extension.
 * - JSON when path ends with ".json"
 * - YAML otherwise
 * Syntax errors are rethrown with the file path prefixed.
 */
export const parseText = (p: string, text: string): unknown => {
  try {
    return p.endsWith('.json')
      ? (JSON.parse(text) as unknown)
      : (YAML.parse(text) as unknown);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`${p.replace(/\\/g, '/')}: ${msg}`);
  }
};
