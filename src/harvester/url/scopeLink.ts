import type { LinkFilters, ScopeDecision, Target } from '../../types.js';
import { inScope } from './inScope.js';

export const JUNK_EXTENSIONS: readonly string[] = [
  '.css', '.jpeg', '.jpg', '.png', '.gif', '.svg', '.ico', '.webp',
  '.mp4', '.mov', '.avi', '.webm', '.mkv',
  '.woff', '.woff2', '.ttf', '.eot', '.otf',
  '.pdf', '.docx', '.xlsx', '.pptx', '.zip', '.rar', '.7z',
  '.xml',
];

const EXCLUDED_SCHEME_PREFIXES = ['mail', 'tel'];

const ABSOLUTE_REFERENCE = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Resolves a raw attribute value against its Target and decides whether it is kept.
 * Checks run in a fixed order and the first failing one names the rejection.
 *
 * A reference that already carries a scheme is kept exactly as written; the parsed form only
 * supplies its host and path. Relative references take the serialized resolution.
 */
export function scopeLink(raw: string, target: Target, filters: LinkFilters): ScopeDecision {
  let resolved: URL;
  try {
    // Relative references resolve against the Target; absolute ones ignore the base.
    resolved = new URL(raw, target.parsed);
  } catch {
    return { retained: false, reason: 'unparseable' };
  }

  const scheme = resolved.protocol.slice(0, -1);
  if (EXCLUDED_SCHEME_PREFIXES.some((prefix) => scheme.startsWith(prefix))) {
    return { retained: false, reason: 'scheme' };
  }

  if (!inScope(resolved.hostname, target.hostname)) {
    return { retained: false, reason: 'out-of-scope' };
  }

  const path = resolved.pathname;
  if (isJunkPath(path)) {
    return { retained: false, reason: 'junk-extension' };
  }

  if (filters.jsOnly !== path.endsWith('.js')) {
    return { retained: false, reason: 'js-filter' };
  }

  const href = ABSOLUTE_REFERENCE.test(raw) ? raw : resolved.href;
  if (href === target.url) {
    return { retained: false, reason: 'self-reference' };
  }

  return { retained: true, url: href };
}

export function isJunkPath(path: string): boolean {
  const lowered = path.toLowerCase();
  return JUNK_EXTENSIONS.some((extension) => lowered.endsWith(extension));
}
