import chalk from 'chalk';

import type { HarvestSummary, SkipEvent } from '../types.js';

let quietMode = false;

export function setOutputConfig(config: { quiet: boolean }): void {
  quietMode = config.quiet;
}

export function resetOutputConfig(): void {
  setOutputConfig({ quiet: false });
}

export function writeTargetStart(target: string): void {
  process.stdout.write(
    `${chalk.cyan('--- [INFO] Processing')} ${chalk.yellow(target)} ${chalk.cyan('---')}\n`,
  );
}

export function writeLink(link: string): void {
  if (quietMode) {
    return;
  }

  process.stdout.write(`${chalk.green(renderLink(link))}\n`);
}

export function writeSkip(event: SkipEvent): void {
  const line = renderSkip(event);
  const isWarning = event.category !== 'transport' && event.category !== 'http-status';
  logError(isWarning ? chalk.yellow(line) : chalk.red(line));
}

export function writeOutputWritten(outputFile: string): void {
  const label = chalk.magenta('--- [OUTPUT] Extracted URLs written to');
  process.stdout.write(`${label} ${chalk.yellow(outputFile)} ${chalk.magenta('---')}\n`);
}

export function writeNothingExtracted(): void {
  process.stdout.write(`${chalk.yellow(NOTHING_EXTRACTED_MESSAGE)}\n`);
}

export function writeSummary(summary: HarvestSummary): void {
  process.stdout.write(renderTextSummary(summary));
}

export function logError(message: string): void {
  const payload = message.endsWith('\n') ? message : `${message}\n`;
  process.stderr.write(payload);
}

export const NOTHING_EXTRACTED_MESSAGE =
  'No URLs extracted. Either no links were found or the filters were too restrictive.';

export function renderLink(link: string): string {
  return `[EXTRACTED] ${link}`;
}

export function renderSkip(event: SkipEvent): string {
  switch (event.category) {
    case 'tls':
      return `Warning: Skipping TLS error for ${event.target} - ${event.reason}`;
    case 'timeout':
      return `Warning: Timeout during connection for ${event.target} - ${event.reason}`;
    case 'connection':
      return `Warning: DNS or connection error for ${event.target} - ${event.reason}`;
    case 'http-status':
      return `Error response for ${event.target}: ${event.reason}`;
    case 'transport':
      return `Error fetching ${event.target}: ${event.reason}`;
  }
}

export function renderTextSummary(summary: HarvestSummary): string {
  const lines: string[] = [
    '',
    '--- Harvest Summary ---',
    `Targets: ${summary.targetsTotal}`,
    `Processed: ${summary.targetsSucceeded}`,
    `Skipped: ${summary.targetsSkipped}`,
    `Raw links seen: ${summary.rawLinksSeen}`,
    `Unique links kept: ${summary.uniqueLinks}`,
    `Duration: ${formatDuration(summary.durationMs)}`,
  ];

  const skipEntries = Object.entries(summary.skipCounts).sort(([a], [b]) => a.localeCompare(b));
  if (skipEntries.length > 0) {
    lines.push('Skips:');
    for (const [category, count] of skipEntries) {
      lines.push(`  ${category}: ${count}`);
    }
  }

  const rejectEntries = Object.entries(summary.rejectCounts).sort(([, countA], [, countB]) =>
    (countB ?? 0) - (countA ?? 0),
  );
  if (rejectEntries.length > 0) {
    lines.push('Rejected links:');
    for (const [reason, count] of rejectEntries) {
      lines.push(`  ${reason}: ${count}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

export function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    return '0ms';
  }

  if (durationMs < 1_000) {
    return `${Math.round(durationMs)}ms`;
  }

  const seconds = durationMs / 1_000;
  if (seconds < 60) {
    const precision = seconds >= 10 ? 1 : 2;
    return `${seconds.toFixed(precision)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  const secondsPart =
    remainingSeconds >= 10 ? remainingSeconds.toFixed(0) : remainingSeconds.toFixed(1);
  return `${minutes}m ${secondsPart}s`;
}
