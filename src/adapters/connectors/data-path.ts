/**
 * JSONPath extraction of nested payloads
 *
 * Extraction fails open: no match or an invalid expression returns the
 * payload unchanged, with a warning the caller logs.
 */

import { JSONPath } from 'jsonpath-plus';

export interface PathExtraction {
  value: unknown;
  matched: boolean;
  warning?: string;
}

type JsonInput = null | boolean | number | string | object | unknown[];

function isJsonInput(payload: unknown): payload is JsonInput {
  return payload === null || ['boolean', 'number', 'string', 'object'].includes(typeof payload);
}

/**
 * Narrow a payload with a JSONPath expression.
 * - zero matches: payload unchanged
 * - one match: the matched value
 * - several matches: the list of matched values
 */
export function extractByPath(payload: unknown, path: string): PathExtraction {
  if (!isJsonInput(payload)) {
    return { value: payload, matched: false, warning: `Payload is not JSON, path ${path} ignored` };
  }

  let matches: unknown;
  try {
    matches = JSONPath({ path, json: payload, wrap: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { value: payload, matched: false, warning: `Invalid data path ${path}: ${reason}` };
  }

  if (!Array.isArray(matches) || matches.length === 0) {
    return { value: payload, matched: false, warning: `No data found at path ${path}` };
  }

  if (matches.length === 1) {
    return { value: matches[0], matched: true };
  }

  return { value: matches, matched: true };
}
