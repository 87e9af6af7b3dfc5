import type { LookupFunction } from 'node:net';
import { Agent, type Dispatcher } from 'undici';

import type { DnsOptions } from '../../types.js';
import { DEFAULT_DNS_OPTIONS, createDnsLookup } from './dnsLookup.js';

export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
export const ACCEPT_HEADER = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';

const MAX_REDIRECTIONS = 10;

export interface HttpClientOptions {
  sendAccept: boolean;
  connectTimeoutMs: number;
  requestTimeoutMs: number;
  keepAliveMs: number;
  dns?: DnsOptions;
  /** Replaces the public-resolver lookup entirely, e.g. to pin hosts in tests. */
  lookup?: LookupFunction;
}

export interface HttpClient {
  readonly dispatcher: Dispatcher;
  readonly headers: Readonly<Record<string, string>>;
  readonly requestTimeoutMs: number;
  readonly maxRedirections: number;
  close(): Promise<void>;
}

export const DEFAULT_HTTP_CLIENT_OPTIONS: HttpClientOptions = {
  sendAccept: true,
  connectTimeoutMs: 15_000,
  requestTimeoutMs: 30_000,
  keepAliveMs: 15_000,
  dns: DEFAULT_DNS_OPTIONS,
};

/**
 * Builds the single client a run uses. Certificate verification is disabled, so targets with
 * self-signed or expired certificates are fetched like any other.
 */
export function createHttpClient(options: Partial<HttpClientOptions> = {}): HttpClient {
  const resolved: HttpClientOptions = { ...DEFAULT_HTTP_CLIENT_OPTIONS, ...options };
  const lookup = resolved.lookup ?? createDnsLookup(resolved.dns ?? DEFAULT_DNS_OPTIONS);

  const agent = new Agent({
    connect: {
      rejectUnauthorized: false,
      timeout: resolved.connectTimeoutMs,
      keepAlive: true,
      keepAliveInitialDelay: resolved.keepAliveMs,
      lookup,
    },
    headersTimeout: resolved.requestTimeoutMs,
    bodyTimeout: resolved.requestTimeoutMs,
  });

  const headers: Record<string, string> = { 'user-agent': USER_AGENT };
  if (resolved.sendAccept) {
    headers.accept = ACCEPT_HEADER;
  }

  return {
    dispatcher: agent,
    headers,
    requestTimeoutMs: resolved.requestTimeoutMs,
    maxRedirections: MAX_REDIRECTIONS,
    close: () => agent.close(),
  };
}
