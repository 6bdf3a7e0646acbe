/**
 * Authorization code extraction
 *
 * Looks up callback parameters by case-insensitive key. The payload is the
 * same shape whether it came from a query string, a form body or a JSON body.
 */

import type { CallbackPayload } from './types.js';

/**
 * Default candidate keys, in priority order
 */
export const DEFAULT_CODE_KEYS: readonly string[] = ['code', 'authorization_code'];

function firstValue(value: string | string[]): string | undefined {
  const single = Array.isArray(value) ? value[0] : value;
  return single ? single : undefined;
}

/**
 * Find the first of `keys` present in the payload, ignoring key case.
 *
 * When the payload holds several keys that differ only in case, the one
 * inserted last wins. Multi-valued fields yield their first element; an empty
 * string or empty list counts as absent.
 */
export function findValue(payload: CallbackPayload, keys: readonly string[]): string | undefined {
  const index = new Map<string, string | string[]>();
  for (const [key, value] of Object.entries(payload)) {
    index.set(key.toLowerCase(), value);
  }

  for (const candidate of keys) {
    const value = index.get(candidate.toLowerCase());
    if (value !== undefined) {
      return firstValue(value);
    }
  }
  return undefined;
}

/**
 * Extract the authorization code using the configured candidate keys
 */
export function extractCode(
  payload: CallbackPayload,
  candidateKeys: readonly string[] = DEFAULT_CODE_KEYS
): string | undefined {
  return findValue(payload, candidateKeys);
}

/**
 * Extract the OAuth `state` parameter
 */
export function extractState(payload: CallbackPayload): string | undefined {
  return findValue(payload, ['state']);
}
