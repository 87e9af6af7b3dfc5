import type { RejectReason, SkipCategory } from '../../types.js';

export interface HarvestStats {
  targetsTotal: number;
  targetsSucceeded: number;
  targetsSkipped: number;
  skipCounts: Map<SkipCategory, number>;
  rawLinksSeen: number;
  rejectCounts: Map<RejectReason, number>;
}

export function initializeStats(targetsTotal: number): HarvestStats {
  return {
    targetsTotal,
    targetsSucceeded: 0,
    targetsSkipped: 0,
    skipCounts: new Map<SkipCategory, number>(),
    rawLinksSeen: 0,
    rejectCounts: new Map<RejectReason, number>(),
  };
}

export function recordSkip(stats: HarvestStats, category: SkipCategory): void {
  stats.targetsSkipped += 1;
  stats.skipCounts.set(category, (stats.skipCounts.get(category) ?? 0) + 1);
}

export function recordRejection(stats: HarvestStats, reason: RejectReason): void {
  stats.rejectCounts.set(reason, (stats.rejectCounts.get(reason) ?? 0) + 1);
}
