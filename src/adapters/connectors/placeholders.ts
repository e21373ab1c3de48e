/**
 * Dynamic placeholder handling for request parameters
 *
 * A parameter value of the form "{name}" or "{name free-form hint}" (e.g.
 * "{from mm-yyyy}") is resolved at execution time from caller-supplied
 * values. Unresolved placeholders are dropped with a warning and the
 * request proceeds without them.
 */

import { QueryParameters } from '../../types/connector';

const PLACEHOLDER_PATTERN = /^\s*\{([^{}]*)\}\s*$/;

/**
 * True when the whole value (ignoring surrounding whitespace) is one
 * brace-delimited token with a non-empty name
 */
export function isDynamicPlaceholder(value: unknown): value is string {
  if (typeof value !== 'string') {
    return false;
  }
  const match = PLACEHOLDER_PATTERN.exec(value);
  return match !== null && match[1].trim() !== '';
}

/**
 * First whitespace-delimited token inside the braces.
 * "{type arrests|offenses}" yields "type".
 */
export function extractPlaceholderName(placeholder: string): string {
  const match = PLACEHOLDER_PATTERN.exec(placeholder);
  const inner = match ? match[1] : placeholder;
  return inner.trim().split(/\s+/)[0];
}

export interface ResolvedParameters {
  parameters: QueryParameters;
  /** Parameter keys whose placeholder had no value */
  dropped: string[];
}

/**
 * Partition parameters into hard-coded and dynamic values, resolve the
 * dynamic ones and merge them over the hard-coded ones.
 *
 * Lookup order for a dynamic entry: the exact parameter key in
 * dynamicParams, then the name extracted from the placeholder.
 */
export function resolveParameters(
  parameters: QueryParameters,
  dynamicParams: QueryParameters = {}
): ResolvedParameters {
  const hardCoded: QueryParameters = {};
  const resolved: QueryParameters = {};
  const dropped: string[] = [];

  for (const [key, value] of Object.entries(parameters)) {
    if (!isDynamicPlaceholder(value)) {
      hardCoded[key] = value;
      continue;
    }

    const name = extractPlaceholderName(value);
    const candidate = lookup(dynamicParams, key) ?? lookup(dynamicParams, name);

    if (candidate === undefined) {
      console.warn('[Placeholders] Dropping unresolved placeholder', { parameter: key, placeholder: value });
      dropped.push(key);
      continue;
    }

    resolved[key] = candidate;
  }

  return {
    parameters: { ...hardCoded, ...resolved },
    dropped
  };
}

function lookup(values: QueryParameters, key: string): unknown {
  if (!Object.prototype.hasOwnProperty.call(values, key)) {
    return undefined;
  }
  const value = values[key];
  return value === null ? undefined : value;
}
