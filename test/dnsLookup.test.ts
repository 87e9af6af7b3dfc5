import type { LookupAddress, LookupOptions } from 'node:dns';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';

import {
  createDnsLookup,
  isTransportFailure,
  resolveWithFallback,
  type DnsQuerier,
  type DnsQuerierFactory,
} from '../src/harvester/network/dnsLookup.js';
import { lookupHosts, parseHosts } from '../src/harvester/network/hostsFile.js';
import { configureLogger, setLoggerInstance, type LoggerLike } from '../src/logger.js';
import type { DnsOptions } from '../src/types.js';

const HOSTS = [
  '# local names',
  '127.0.0.1   localhost',
  '::1         localhost ip6-localhost',
  '10.0.0.5    Lab.Internal lab   # bench',
  'not-an-ip   ignored.test',
].join('\n');

let hostsDir: string;
const options: DnsOptions = {
  primaryServer: '192.0.2.1:53',
  fallbackServer: '192.0.2.2:53',
  timeoutMs: 100,
  hostsFile: '',
};

beforeAll(async () => {
  hostsDir = await mkdtemp(path.join(tmpdir(), 'harvest-hosts-'));
  options.hostsFile = path.join(hostsDir, 'hosts');
  await writeFile(options.hostsFile, HOSTS);
});

afterAll(async () => {
  await rm(hostsDir, { recursive: true, force: true });
});

interface ServerAnswers {
  v4?: string[] | Error;
  v6?: string[] | Error;
}

function dnsError(code: string): Error {
  return Object.assign(new Error(`query ${code}`), { code });
}

function fakeServers(answers: Record<string, ServerAnswers>): {
  factory: DnsQuerierFactory;
  queried: string[];
} {
  const queried: string[] = [];

  const answer = async (value: string[] | Error | undefined): Promise<string[]> => {
    if (value instanceof Error) {
      throw value;
    }
    return value ?? [];
  };

  const factory: DnsQuerierFactory = (server) => {
    const configured = answers[server] ?? {};
    const querier: DnsQuerier = {
      resolve4: (hostname) => {
        queried.push(`${server} A ${hostname}`);
        return answer(configured.v4);
      },
      resolve6: (hostname) => {
        queried.push(`${server} AAAA ${hostname}`);
        return answer(configured.v6);
      },
    };
    return querier;
  };

  return { factory, queried };
}

function lookupAll(
  factory: DnsQuerierFactory,
  hostname: string,
  all: boolean,
  extra: LookupOptions = {},
): Promise<{ address: string | LookupAddress[]; family?: number }> {
  const lookup = createDnsLookup(options, factory);
  return new Promise((resolve, reject) => {
    lookup(hostname, { ...extra, all }, (error, address, family) => {
      if (error) {
        reject(error);
        return;
      }
      resolve({ address, family });
    });
  });
}

describe('resolveWithFallback', () => {
  afterEach(() => {
    configureLogger();
  });

  it('uses the primary server when it answers', async () => {
    const { factory, queried } = fakeServers({
      [options.primaryServer]: { v4: ['203.0.113.10'] },
    });

    await expect(resolveWithFallback('example.test', options, factory)).resolves.toEqual([
      { address: '203.0.113.10', family: 4 },
    ]);
    expect(queried).toEqual(['192.0.2.1:53 A example.test']);
  });

  it('falls back when the primary server cannot be reached', async () => {
    const { factory, queried } = fakeServers({
      [options.primaryServer]: { v4: dnsError('ETIMEOUT') },
      [options.fallbackServer]: { v4: ['203.0.113.20'] },
    });

    await expect(resolveWithFallback('example.test', options, factory)).resolves.toEqual([
      { address: '203.0.113.20', family: 4 },
    ]);
    expect(queried).toEqual(['192.0.2.1:53 A example.test', '192.0.2.2:53 A example.test']);
  });

  it('logs the switch to the fallback server', async () => {
    const debug = vi.fn();
    const logger: LoggerLike = { debug, info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    setLoggerInstance(logger);

    const { factory } = fakeServers({
      [options.primaryServer]: { v4: dnsError('ECONNREFUSED') },
      [options.fallbackServer]: { v4: ['203.0.113.20'] },
    });
    await resolveWithFallback('example.test', options, factory);

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0]?.[1]).toBe('primary DNS server unreachable, retrying with fallback');
  });

  it('treats a missing domain as final', async () => {
    const { factory, queried } = fakeServers({
      [options.primaryServer]: { v4: dnsError('ENOTFOUND'), v6: dnsError('ENOTFOUND') },
      [options.fallbackServer]: { v4: ['203.0.113.20'] },
    });

    await expect(resolveWithFallback('missing.test', options, factory)).rejects.toMatchObject({
      code: 'ENOTFOUND',
    });
    expect(queried).toEqual(['192.0.2.1:53 A missing.test', '192.0.2.1:53 AAAA missing.test']);
  });

  it('asks for AAAA records when there are no A records', async () => {
    const { factory } = fakeServers({
      [options.primaryServer]: { v4: dnsError('ENODATA'), v6: ['2001:db8::1'] },
    });

    await expect(resolveWithFallback('v6only.test', options, factory)).resolves.toEqual([
      { address: '2001:db8::1', family: 6 },
    ]);
  });
});

describe('createDnsLookup', () => {
  it('hands back the first address by default', async () => {
    const { factory } = fakeServers({
      [options.primaryServer]: { v4: ['203.0.113.10', '203.0.113.11'] },
    });

    await expect(lookupAll(factory, 'example.test', false)).resolves.toEqual({
      address: '203.0.113.10',
      family: 4,
    });
  });

  it('hands back every address when asked for all', async () => {
    const { factory } = fakeServers({
      [options.primaryServer]: { v4: ['203.0.113.10', '203.0.113.11'] },
    });

    const result = await lookupAll(factory, 'example.test', true);
    expect(result.address).toEqual([
      { address: '203.0.113.10', family: 4 },
      { address: '203.0.113.11', family: 4 },
    ]);
  });

  it('reports an empty answer as ENOTFOUND', async () => {
    const { factory } = fakeServers({ [options.primaryServer]: { v4: [], v6: [] } });

    await expect(lookupAll(factory, 'empty.test', false)).rejects.toMatchObject({
      code: 'ENOTFOUND',
      hostname: 'empty.test',
    });
  });
});

describe('hosts file', () => {
  it('answers localhost without querying any server', async () => {
    const { factory, queried } = fakeServers({
      [options.primaryServer]: { v4: dnsError('ENOTFOUND') },
    });

    const result = await lookupAll(factory, 'localhost', true);
    expect(result.address).toEqual([
      { address: '127.0.0.1', family: 4 },
      { address: '::1', family: 6 },
    ]);
    expect(queried).toEqual([]);
  });

  it('matches names case-insensitively and honours the requested family', async () => {
    const { factory, queried } = fakeServers({});

    await expect(lookupAll(factory, 'LAB.internal', false)).resolves.toEqual({
      address: '10.0.0.5',
      family: 4,
    });
    await expect(lookupAll(factory, 'localhost', false, { family: 6 })).resolves.toEqual({
      address: '::1',
      family: 6,
    });
    expect(queried).toEqual([]);
  });

  it('sends names missing from the file to the resolvers', async () => {
    const { factory, queried } = fakeServers({
      [options.primaryServer]: { v4: ['203.0.113.10'] },
    });

    await lookupAll(factory, 'ignored.test', false);
    expect(queried).toEqual(['192.0.2.1:53 A ignored.test']);
  });

  it('parses aliases, comments and trailing dots', () => {
    const table = parseHosts(HOSTS);

    expect(lookupHosts(table, 'lab.')).toEqual([{ address: '10.0.0.5', family: 4 }]);
    expect(lookupHosts(table, 'ip6-localhost')).toEqual([{ address: '::1', family: 6 }]);
    expect(lookupHosts(table, 'bench')).toEqual([]);
    expect(lookupHosts(table, 'ignored.test')).toEqual([]);
  });
});

describe('isTransportFailure', () => {
  it('recognises unreachable-server codes only', () => {
    expect(isTransportFailure(dnsError('ECONNREFUSED'))).toBe(true);
    expect(isTransportFailure(dnsError('ESERVFAIL'))).toBe(true);
    expect(isTransportFailure(dnsError('ENOTFOUND'))).toBe(false);
    expect(isTransportFailure(new Error('no code'))).toBe(false);
  });
});
