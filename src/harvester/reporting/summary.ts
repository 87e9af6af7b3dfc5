import type { HarvestSummary } from '../../types.js';
import type { LinkAggregator } from '../state/aggregator.js';
import type { HarvestStats } from '../state/stats.js';

export function buildHarvestSummary(options: {
  stats: HarvestStats;
  aggregator: LinkAggregator;
  startTime: number;
  now?: number;
}): HarvestSummary {
  const { stats, aggregator, startTime, now = Date.now() } = options;

  return {
    targetsTotal: stats.targetsTotal,
    targetsSucceeded: stats.targetsSucceeded,
    targetsSkipped: stats.targetsSkipped,
    skipCounts: Object.fromEntries(stats.skipCounts.entries()),
    rawLinksSeen: stats.rawLinksSeen,
    rejectCounts: Object.fromEntries(stats.rejectCounts.entries()),
    uniqueLinks: aggregator.size,
    durationMs: now - startTime,
  };
}
