import type { LookupAddress } from 'node:dns';
import { readFile } from 'node:fs/promises';
import { isIP } from 'node:net';
import path from 'node:path';

import { getLogger } from '../../logger.js';

export type HostsTable = ReadonlyMap<string, readonly LookupAddress[]>;

export function defaultHostsFilePath(): string {
  if (process.platform === 'win32') {
    const systemRoot = process.env.SystemRoot ?? 'C:\\Windows';
    return path.win32.join(systemRoot, 'System32', 'drivers', 'etc', 'hosts');
  }

  return '/etc/hosts';
}

/**
 * Parses hosts-file text into a table keyed by lowercased name. Addresses keep file order;
 * lines whose first field is not an IP literal are ignored.
 */
export function parseHosts(contents: string): HostsTable {
  const table = new Map<string, LookupAddress[]>();

  for (const rawLine of contents.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (line.length === 0) {
      continue;
    }

    const [address, ...names] = line.split(/\s+/);
    const family = address ? isIP(address) : 0;
    if (!address || family === 0) {
      continue;
    }

    for (const name of names) {
      const key = name.toLowerCase();
      const entries = table.get(key) ?? [];
      if (!entries.some((entry) => entry.address === address)) {
        entries.push({ address, family });
      }
      table.set(key, entries);
    }
  }

  return table;
}

/** Reads the table on every call so edits apply to the next connection. A missing file is empty. */
export async function readHostsFile(filePath: string): Promise<HostsTable> {
  try {
    return parseHosts(await readFile(filePath, 'utf8'));
  } catch (error) {
    getLogger().debug({ hostsFile: filePath, err: error }, 'hosts file unavailable');
    return new Map();
  }
}

export function lookupHosts(table: HostsTable, hostname: string): LookupAddress[] {
  const key = hostname.toLowerCase().replace(/\.$/, '');
  return [...(table.get(key) ?? [])];
}
