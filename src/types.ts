import type { HarvestError } from './errors.js';
import type { LogLevel } from './logger.js';

export interface Target {
  /** The user string with a scheme guaranteed; compared verbatim for self-reference suppression. */
  url: string;
  parsed: URL;
  hostname: string;
}

export type SkipCategory = 'tls' | 'timeout' | 'connection' | 'transport' | 'http-status';

export type RejectReason =
  | 'unparseable'
  | 'scheme'
  | 'out-of-scope'
  | 'junk-extension'
  | 'js-filter'
  | 'self-reference';

export type ScopeDecision =
  | { retained: true; url: string }
  | { retained: false; reason: RejectReason };

export interface LinkFilters {
  jsOnly: boolean;
}

export interface SkipEvent {
  target: string;
  category: SkipCategory;
  reason: string;
  status: number | null;
  error?: HarvestError;
}

export interface HarvestSummary {
  targetsTotal: number;
  targetsSucceeded: number;
  targetsSkipped: number;
  skipCounts: Partial<Record<SkipCategory, number>>;
  rawLinksSeen: number;
  rejectCounts: Partial<Record<RejectReason, number>>;
  uniqueLinks: number;
  durationMs: number;
}

export interface HarvestHandlers {
  onTargetStart?(target: string): void;
  onLink(link: string, target: string): void;
  onSkip?(event: SkipEvent): void;
  onComplete?(summary: HarvestSummary): void;
}

export interface DnsOptions {
  primaryServer: string;
  fallbackServer: string;
  timeoutMs: number;
  /** Consulted before any DNS query. */
  hostsFile: string;
}

export interface HarvestOptions {
  outputFile: string;
  /** Accepted for compatibility; the equal-or-subdomain scope rule always applies. */
  sameDomain: boolean;
  jsOnly: boolean;
  sendAccept: boolean;
  concurrency: number;
  connectTimeoutMs: number;
  requestTimeoutMs: number;
  keepAliveMs: number;
  dns: DnsOptions;
  quiet: boolean;
  logLevel: LogLevel;
}

export interface HarvestOrchestratorConfig extends Partial<Omit<HarvestOptions, 'dns'>> {
  url?: string;
  listFile?: string;
  dns?: Partial<DnsOptions>;
  handlers?: Partial<HarvestHandlers>;
}

export interface HarvestResult {
  summary: HarvestSummary;
  links: string[];
  outputWritten: boolean;
}
