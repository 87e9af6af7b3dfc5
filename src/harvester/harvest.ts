import pLimit from 'p-limit';

import { ensureHarvestError } from '../errors.js';
import { getLogger } from '../logger.js';
import type { HarvestHandlers, HarvestSummary, LinkFilters, SkipEvent, Target } from '../types.js';
import { reportHarvestError } from '../util/errorHandler.js';
import { fetchTarget, type FetchSuccess } from './network/fetchTarget.js';
import type { HttpClient } from './network/httpClient.js';
import { extractLinks } from './parsing/extractLinks.js';
import { buildHarvestSummary } from './reporting/summary.js';
import type { LinkAggregator } from './state/aggregator.js';
import { initializeStats, recordRejection, recordSkip, type HarvestStats } from './state/stats.js';
import { scopeLink } from './url/scopeLink.js';

export interface HarvestRuntimeOptions {
  targets: readonly Target[];
  client: HttpClient;
  aggregator: LinkAggregator;
  filters: LinkFilters;
  concurrency: number;
  handlers: HarvestHandlers;
}

/**
 * Runs every Target through fetch, extraction and scoping. Targets are isolated from each other:
 * whatever goes wrong with one is reported and counted, and the run moves on.
 */
class HarvestEngine {
  private readonly stats: HarvestStats;
  private readonly limiter: ReturnType<typeof pLimit>;
  private readonly startTime = Date.now();

  constructor(private readonly options: HarvestRuntimeOptions) {
    this.stats = initializeStats(options.targets.length);
    this.limiter = pLimit(options.concurrency);
  }

  async run(): Promise<HarvestSummary> {
    await Promise.all(
      this.options.targets.map((target) => this.limiter(() => this.processTarget(target))),
    );

    return buildHarvestSummary({
      stats: this.stats,
      aggregator: this.options.aggregator,
      startTime: this.startTime,
    });
  }

  private async processTarget(target: Target): Promise<void> {
    try {
      await this.harvestTarget(target);
    } catch (error) {
      const harvestError = ensureHarvestError(error, {
        kind: 'internal',
        severity: 'recoverable',
        details: { target: target.url },
      });

      reportHarvestError(
        harvestError,
        { stage: 'harvest', target: target.url },
        { throwOnFatal: false },
      );
      recordSkip(this.stats, 'transport');
    }
  }

  private async harvestTarget(target: Target): Promise<void> {
    const outcome = await fetchTarget(target, this.options.client);

    if (!outcome.ok) {
      this.handleSkip({
        target: target.url,
        category: outcome.category,
        reason: outcome.reason,
        status: outcome.status,
        error: outcome.error,
      });
      return;
    }

    this.options.handlers.onTargetStart?.(target.url);

    try {
      await this.collectLinks(target, outcome);
    } finally {
      outcome.release();
    }

    this.stats.targetsSucceeded += 1;
  }

  private async collectLinks(target: Target, outcome: FetchSuccess): Promise<void> {
    for await (const raw of extractLinks(outcome.body)) {
      this.stats.rawLinksSeen += 1;

      const decision = scopeLink(raw, target, this.options.filters);
      if (!decision.retained) {
        recordRejection(this.stats, decision.reason);
        continue;
      }

      if (this.options.aggregator.insert(decision.url)) {
        this.options.handlers.onLink(decision.url, target.url);
      }
    }
  }

  private handleSkip(event: SkipEvent): void {
    getLogger().debug(
      { target: event.target, category: event.category, status: event.status, err: event.error },
      'target skipped',
    );
    recordSkip(this.stats, event.category);
    this.options.handlers.onSkip?.(event);
  }
}

export async function harvest(options: HarvestRuntimeOptions): Promise<HarvestSummary> {
  const engine = new HarvestEngine(options);
  return engine.run();
}
