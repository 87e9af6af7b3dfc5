import { readFile } from 'node:fs/promises';

import { createConfigurationError } from '../errors.js';

/**
 * Reads a newline-delimited list of targets. Lines are trimmed and blank lines dropped;
 * validation is left to target normalization so one bad line never hides the rest.
 */
export async function readTargetsFile(path: string): Promise<string[]> {
  let contents: string;
  try {
    contents = await readFile(path, 'utf8');
  } catch (error) {
    throw createConfigurationError(`Unable to read target list: ${path}`, { path }, { cause: error });
  }

  return contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
