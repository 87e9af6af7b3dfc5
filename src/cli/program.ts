import { Command } from 'commander';

import { createConfigurationError } from '../errors.js';
import { isLogLevel } from '../logger.js';
import type { HarvestOrchestratorConfig } from '../types.js';
import { reportHarvestError } from '../util/errorHandler.js';

export type HarvestRunner = (config: HarvestOrchestratorConfig) => Promise<unknown>;

export function buildProgram(options: { version: string; run: HarvestRunner }): Command {
  const program = new Command();

  program
    .name('link-harvester')
    .description('Fetch pages and extract in-scope links and script references from their HTML.')
    .version(options.version)
    .option('-u, --url <url>', 'Single URL to fetch.')
    .option('-l, --list <file>', 'Text file containing a list of URLs, one per line.')
    .option('-o, --output <file>', 'Output file the extracted URLs are appended to.', 'extracted.txt')
    .option('-d, --same-domain', 'Extract only links on the target domain or its subdomains (always on).')
    .option('-j, --js-only', 'Extract only .js files instead of excluding them.')
    .option('--no-accept', 'Do not send the Accept header.')
    .option('--concurrency <number>', 'Number of targets fetched at the same time. (default: 1)')
    .option('--quiet', 'Do not print each extracted URL.')
    .option(
      '--log-level <level>',
      'Diagnostic log level (pino levels: trace|debug|info|warn|error|fatal|silent).',
    )
    .action(async (rawOptions: Record<string, unknown>) => {
      // An empty -u counts as missing.
      if (!rawOptions.url && !rawOptions.list) {
        program.help({ error: true });
      }

      try {
        await options.run(buildConfig(rawOptions));
      } catch (error) {
        reportCliError(error);
      }
    });

  return program;
}

export function buildConfig(rawOptions: Record<string, unknown>): HarvestOrchestratorConfig {
  const config: HarvestOrchestratorConfig = {
    sameDomain: rawOptions.sameDomain === true,
    jsOnly: rawOptions.jsOnly === true,
    sendAccept: rawOptions.accept !== false,
    quiet: rawOptions.quiet === true,
  };

  if (rawOptions.url !== undefined) {
    config.url = String(rawOptions.url);
  }

  if (rawOptions.list !== undefined) {
    config.listFile = String(rawOptions.list);
  }

  if (rawOptions.output !== undefined) {
    config.outputFile = String(rawOptions.output);
  }

  if (rawOptions.concurrency !== undefined) {
    config.concurrency = asNumber(rawOptions.concurrency, 'concurrency');
  }

  if (rawOptions.logLevel !== undefined) {
    const level = String(rawOptions.logLevel).toLowerCase();
    if (!isLogLevel(level)) {
      throw createConfigurationError(`Unsupported log level: ${level}`, { value: level });
    }
    config.logLevel = level;
  }

  return config;
}

function asNumber(value: unknown, label: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createConfigurationError(`${label} must be a finite number.`, { value });
  }

  return parsed;
}

function reportCliError(error: unknown): void {
  reportHarvestError(error, { stage: 'cli' }, {
    defaultKind: 'internal',
    defaultSeverity: 'fatal',
    throwOnFatal: false,
  });
  process.exitCode = 1;
}
