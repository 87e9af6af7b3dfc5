import { appendFile } from 'node:fs/promises';

import { createOutputError } from '../errors.js';

/** Appends one URL per line; existing content is kept and the file is created when missing. */
export async function appendLinks(path: string, links: readonly string[]): Promise<void> {
  if (links.length === 0) {
    return;
  }

  const payload = links.map((link) => `${link}\n`).join('');

  try {
    await appendFile(path, payload, { encoding: 'utf8' });
  } catch (error) {
    throw createOutputError(`Unable to write extracted URLs to ${path}`, { path }, { cause: error });
  }
}
