import type { SkipCategory } from '../../types.js';

export type TransportFailureCategory = Exclude<SkipCategory, 'http-status'>;

const TLS_CODES = new Set([
  'EPROTO',
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
]);
const TLS_CODE_PREFIXES = ['ERR_SSL_', 'ERR_TLS_'];

const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'ETIMEOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const TIMEOUT_NAMES = new Set(['TimeoutError', 'ConnectTimeoutError']);

const CONNECTION_CODES = new Set([
  'ENOTFOUND',
  'EAI_AGAIN',
  'ECONNREFUSED',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENODATA',
  'ESERVFAIL',
  'EREFUSED',
  'UND_ERR_SOCKET',
]);

const TLS_MESSAGE = /certificate|\btls\b|\bssl\b/i;
const TIMEOUT_MESSAGE = /timed out|timeout/i;
const CONNECTION_MESSAGE = /lookup|connect/i;

interface ErrorSignals {
  codes: string[];
  names: string[];
  messages: string[];
}

/**
 * Maps a transport failure onto the skip taxonomy. Error codes and names found anywhere in the
 * cause chain win; message matching only runs when none of them is recognised.
 */
export function classifyFetchError(error: unknown): TransportFailureCategory {
  const signals = collectSignals(error);

  if (signals.codes.some(isTlsCode)) {
    return 'tls';
  }

  if (
    signals.codes.some((code) => TIMEOUT_CODES.has(code)) ||
    signals.names.some((name) => TIMEOUT_NAMES.has(name))
  ) {
    return 'timeout';
  }

  if (signals.codes.some((code) => CONNECTION_CODES.has(code))) {
    return 'connection';
  }

  if (signals.messages.some((message) => TLS_MESSAGE.test(message))) {
    return 'tls';
  }

  if (signals.messages.some((message) => TIMEOUT_MESSAGE.test(message))) {
    return 'timeout';
  }

  if (signals.messages.some((message) => CONNECTION_MESSAGE.test(message))) {
    return 'connection';
  }

  return 'transport';
}

export function extractErrorCode(error: unknown): string | undefined {
  return collectSignals(error).codes[0];
}

function isTlsCode(code: string): boolean {
  return TLS_CODES.has(code) || TLS_CODE_PREFIXES.some((prefix) => code.startsWith(prefix));
}

function collectSignals(error: unknown): ErrorSignals {
  const signals: ErrorSignals = { codes: [], names: [], messages: [] };
  const pending: unknown[] = [error];
  const seen = new Set<unknown>();

  while (pending.length > 0) {
    const current = pending.shift();
    if (!(current instanceof Error) || seen.has(current)) {
      continue;
    }
    seen.add(current);

    signals.names.push(current.name);
    if (current.message) {
      signals.messages.push(current.message);
    }

    if ('code' in current && typeof current.code === 'string') {
      signals.codes.push(current.code);
    }

    if (current instanceof AggregateError) {
      pending.push(...current.errors);
    }

    pending.push(current.cause);
  }

  return signals;
}
