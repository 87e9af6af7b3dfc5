import type { LookupAddress, LookupOptions } from 'node:dns';
import { Resolver } from 'node:dns/promises';
import type { LookupFunction } from 'node:net';

import { getLogger } from '../../logger.js';
import type { DnsOptions } from '../../types.js';
import { defaultHostsFilePath, lookupHosts, readHostsFile } from './hostsFile.js';

export const DEFAULT_DNS_OPTIONS: DnsOptions = {
  primaryServer: '1.1.1.1:53',
  fallbackServer: '8.8.8.8:53',
  timeoutMs: 10_000,
  hostsFile: defaultHostsFilePath(),
};

export interface DnsQuerier {
  resolve4(hostname: string): Promise<string[]>;
  resolve6(hostname: string): Promise<string[]>;
}

export type DnsQuerierFactory = (server: string, timeoutMs: number) => DnsQuerier;

// Failures of the exchange with the server itself; an authoritative answer such as NXDOMAIN is final.
const TRANSPORT_FAILURE_CODES = new Set([
  'ETIMEOUT',
  'ECONNREFUSED',
  'ECONNRESET',
  'EREFUSED',
  'ESERVFAIL',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'ECANCELLED',
]);

const NO_RECORD_CODES = new Set(['ENODATA', 'ENOTFOUND']);

export const createSystemQuerier: DnsQuerierFactory = (server, timeoutMs) => {
  const resolver = new Resolver({ timeout: timeoutMs, tries: 1 });
  resolver.setServers([server]);
  return resolver;
};

/**
 * Builds a lookup for outbound sockets. Names in the hosts file are answered from it; anything
 * else goes to the primary public resolver, and to the fallback resolver only when the primary
 * cannot be reached. Nothing is cached: each new connection runs the selection again.
 */
export function createDnsLookup(
  options: DnsOptions = DEFAULT_DNS_OPTIONS,
  createQuerier: DnsQuerierFactory = createSystemQuerier,
): LookupFunction {
  return (hostname, lookupOptions, callback) => {
    resolveAddresses(hostname, options, createQuerier)
      .then((addresses) => {
        const matching = filterFamily(addresses, lookupOptions);
        const first = matching[0];
        if (!first) {
          callback(createDnsError(`No addresses found for ${hostname}`, 'ENOTFOUND', hostname), []);
          return;
        }

        if (lookupOptions.all) {
          callback(null, matching);
        } else {
          callback(null, first.address, first.family);
        }
      })
      .catch((error: unknown) => {
        callback(toErrnoException(error, hostname), []);
      });
  };
}

export async function resolveAddresses(
  hostname: string,
  options: DnsOptions,
  createQuerier: DnsQuerierFactory,
): Promise<LookupAddress[]> {
  const fromHosts = lookupHosts(await readHostsFile(options.hostsFile), hostname);
  if (fromHosts.length > 0) {
    return fromHosts;
  }

  return resolveWithFallback(hostname, options, createQuerier);
}

export async function resolveWithFallback(
  hostname: string,
  options: DnsOptions,
  createQuerier: DnsQuerierFactory,
): Promise<LookupAddress[]> {
  try {
    return await queryServer(hostname, options.primaryServer, options.timeoutMs, createQuerier);
  } catch (error) {
    if (!isTransportFailure(error)) {
      throw error;
    }

    getLogger().debug(
      { hostname, primary: options.primaryServer, fallback: options.fallbackServer, err: error },
      'primary DNS server unreachable, retrying with fallback',
    );
    return queryServer(hostname, options.fallbackServer, options.timeoutMs, createQuerier);
  }
}

async function queryServer(
  hostname: string,
  server: string,
  timeoutMs: number,
  createQuerier: DnsQuerierFactory,
): Promise<LookupAddress[]> {
  const querier = createQuerier(server, timeoutMs);

  try {
    const v4 = await querier.resolve4(hostname);
    if (v4.length > 0) {
      return v4.map((address) => ({ address, family: 4 }));
    }
  } catch (error) {
    if (!hasCode(error, NO_RECORD_CODES)) {
      throw error;
    }
  }

  const v6 = await querier.resolve6(hostname);
  return v6.map((address) => ({ address, family: 6 }));
}

function filterFamily(addresses: LookupAddress[], options: LookupOptions): LookupAddress[] {
  const family = options.family === 'IPv4' ? 4 : options.family === 'IPv6' ? 6 : options.family;
  if (family !== 4 && family !== 6) {
    return addresses;
  }

  return addresses.filter((entry) => entry.family === family);
}

export function isTransportFailure(error: unknown): boolean {
  return hasCode(error, TRANSPORT_FAILURE_CODES);
}

function hasCode(error: unknown, codes: ReadonlySet<string>): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }

  return typeof error.code === 'string' && codes.has(error.code);
}

function toErrnoException(error: unknown, hostname: string): NodeJS.ErrnoException {
  if (error instanceof Error) {
    return error;
  }

  return createDnsError(`DNS lookup failed for ${hostname}: ${String(error)}`, 'ENOTFOUND', hostname);
}

function createDnsError(message: string, code: string, hostname: string): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code, hostname, syscall: 'queryA' });
}
