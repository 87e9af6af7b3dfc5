import { createInputError } from '../../errors.js';
import type { Target } from '../../types.js';

const SCHEME_PATTERN = /^https?:\/\//i;

/**
 * Turns user input into a Target, prefixing `http://` when no http(s) scheme is given.
 * Returns null for blank input; throws an input error for anything that still is not a valid
 * http(s) URL.
 */
export function normalizeTarget(raw: string): Target | null {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const url = SCHEME_PATTERN.test(trimmed) ? trimmed : `http://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw createInputError(`Invalid target URL: ${trimmed}`, { target: trimmed }, { cause: error });
  }

  if (parsed.hostname.length === 0) {
    throw createInputError(`Target URL has no host: ${trimmed}`, { target: trimmed });
  }

  return { url, parsed, hostname: parsed.hostname };
}
