import { createConfigurationError, isHarvestError } from './errors.js';
import { harvest } from './harvester/harvest.js';
import { createDefaultHandlers } from './harvester/handlers/defaultHandlers.js';
import { DEFAULT_DNS_OPTIONS } from './harvester/network/dnsLookup.js';
import { createHttpClient, type HttpClientOptions } from './harvester/network/httpClient.js';
import { LinkAggregator } from './harvester/state/aggregator.js';
import { normalizeTarget } from './harvester/url/normalizeTarget.js';
import { configureLogger, getLogger } from './logger.js';
import type {
  DnsOptions,
  HarvestHandlers,
  HarvestOptions,
  HarvestOrchestratorConfig,
  HarvestResult,
  HarvestSummary,
  Target,
} from './types.js';
import { reportHarvestError } from './util/errorHandler.js';
import { appendLinks } from './util/outputFile.js';
import {
  resetOutputConfig,
  setOutputConfig,
  writeNothingExtracted,
  writeOutputWritten,
  writeSummary,
} from './util/output.js';
import { readTargetsFile } from './util/targets.js';

export const DEFAULT_OPTIONS: HarvestOptions = {
  outputFile: 'extracted.txt',
  sameDomain: false,
  jsOnly: false,
  sendAccept: true,
  concurrency: 1,
  connectTimeoutMs: 15_000,
  requestTimeoutMs: 30_000,
  keepAliveMs: 15_000,
  dns: DEFAULT_DNS_OPTIONS,
  quiet: false,
  logLevel: 'silent',
};

export interface OrchestratorDependencies {
  /** Overrides individual HTTP client settings, such as the DNS lookup. */
  httpClient?: Partial<Pick<HttpClientOptions, 'lookup'>>;
}

export async function harvestOrchestrator(
  config: HarvestOrchestratorConfig,
  dependencies: OrchestratorDependencies = {},
): Promise<HarvestResult> {
  const options = resolveOptions(config);
  if (config.logLevel !== undefined) {
    configureLogger({ level: options.logLevel });
  }

  if (!config.url?.trim() && !config.listFile) {
    throw createConfigurationError('A target URL or a target list file is required.');
  }

  const targets = await loadTargets(config);

  const handlers: HarvestHandlers = {
    ...createDefaultHandlers(),
    ...(config.handlers ?? {}),
  };

  const client = createHttpClient({
    sendAccept: options.sendAccept,
    connectTimeoutMs: options.connectTimeoutMs,
    requestTimeoutMs: options.requestTimeoutMs,
    keepAliveMs: options.keepAliveMs,
    dns: options.dns,
    ...dependencies.httpClient,
  });
  const aggregator = new LinkAggregator();

  setOutputConfig({ quiet: options.quiet });
  getLogger().info({ targets: targets.length, options }, 'harvest starting');

  try {
    const summary = await harvest({
      targets,
      client,
      aggregator,
      filters: { jsOnly: options.jsOnly },
      concurrency: options.concurrency,
      handlers,
    });

    getLogger().info({ summary }, 'harvest finished');

    const links = aggregator.drain();
    const outputWritten = await writeResults(options.outputFile, links);
    complete(summary, handlers);

    return { summary, links, outputWritten };
  } finally {
    resetOutputConfig();
    await client.close();
  }
}

async function writeResults(outputFile: string, links: string[]): Promise<boolean> {
  if (links.length === 0) {
    writeNothingExtracted();
    return false;
  }

  await appendLinks(outputFile, links);
  writeOutputWritten(outputFile);
  return true;
}

function complete(summary: HarvestSummary, handlers: HarvestHandlers): void {
  if (handlers.onComplete) {
    handlers.onComplete(summary);
  } else {
    writeSummary(summary);
  }
}

export async function loadTargets(
  config: Pick<HarvestOrchestratorConfig, 'url' | 'listFile'>,
): Promise<Target[]> {
  const rawTargets: string[] = [];

  if (config.url !== undefined && config.url.trim().length > 0) {
    rawTargets.push(config.url);
  }

  if (config.listFile) {
    rawTargets.push(...(await readTargetsFile(config.listFile)));
  }

  const targets: Target[] = [];
  rawTargets.forEach((raw, index) => {
    try {
      const target = normalizeTarget(raw);
      if (target) {
        targets.push(target);
      }
    } catch (error) {
      if (!isHarvestError(error) || error.kind !== 'input') {
        throw error;
      }
      reportHarvestError(error, { stage: 'input', entry: index + 1 }, { throwOnFatal: false });
    }
  });

  return targets;
}

export function resolveOptions(config: HarvestOrchestratorConfig): HarvestOptions {
  const dns: DnsOptions = {
    ...DEFAULT_DNS_OPTIONS,
    ...(config.dns ?? {}),
  };

  const outputFile = config.outputFile ?? DEFAULT_OPTIONS.outputFile;
  if (outputFile.trim().length === 0) {
    throw createConfigurationError('Output file path must not be empty.', { outputFile });
  }

  return {
    outputFile,
    sameDomain: config.sameDomain ?? DEFAULT_OPTIONS.sameDomain,
    jsOnly: config.jsOnly ?? DEFAULT_OPTIONS.jsOnly,
    sendAccept: config.sendAccept ?? DEFAULT_OPTIONS.sendAccept,
    concurrency: coercePositiveInteger(
      config.concurrency ?? DEFAULT_OPTIONS.concurrency,
      'concurrency',
    ),
    connectTimeoutMs: coercePositiveInteger(
      config.connectTimeoutMs ?? DEFAULT_OPTIONS.connectTimeoutMs,
      'connect-timeout-ms',
    ),
    requestTimeoutMs: coercePositiveInteger(
      config.requestTimeoutMs ?? DEFAULT_OPTIONS.requestTimeoutMs,
      'request-timeout-ms',
    ),
    keepAliveMs: coercePositiveInteger(
      config.keepAliveMs ?? DEFAULT_OPTIONS.keepAliveMs,
      'keep-alive-ms',
    ),
    dns: {
      ...dns,
      timeoutMs: coercePositiveInteger(dns.timeoutMs, 'dns-timeout-ms'),
    },
    quiet: config.quiet ?? DEFAULT_OPTIONS.quiet,
    logLevel: config.logLevel ?? DEFAULT_OPTIONS.logLevel,
  };
}

function coercePositiveInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw createConfigurationError(`${field} must be a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

export { LinkAggregator } from './harvester/state/aggregator.js';
export { extractLinks, collectLinks } from './harvester/parsing/extractLinks.js';
export { scopeLink } from './harvester/url/scopeLink.js';
export { fetchTarget } from './harvester/network/fetchTarget.js';
export { createHttpClient } from './harvester/network/httpClient.js';
export { createDnsLookup } from './harvester/network/dnsLookup.js';
export type { HarvestOptions, HarvestOrchestratorConfig, HarvestResult, HarvestSummary, Target };
