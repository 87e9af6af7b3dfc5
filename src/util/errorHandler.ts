import chalk from 'chalk';

import {
  HarvestError,
  ensureHarvestError,
  type ErrorKind,
  type ErrorSeverity,
} from '../errors.js';
import { getLogger } from '../logger.js';

export interface ErrorContext extends Record<string, unknown> {
  stage?: string;
  target?: string;
  entry?: number;
}

export interface ErrorHandlingOptions {
  defaultKind?: ErrorKind;
  defaultSeverity?: ErrorSeverity;
  throwOnFatal?: boolean;
}

export function reportHarvestError(
  error: unknown,
  context: ErrorContext = {},
  options: ErrorHandlingOptions = {},
): HarvestError {
  const harvestError = ensureHarvestError(error, {
    kind: options.defaultKind ?? 'internal',
    severity: options.defaultSeverity,
    details: context,
  });

  const mergedDetails: Record<string, unknown> = {
    ...(harvestError.details ?? {}),
    ...context,
  };

  const message = buildLogMessage(harvestError, mergedDetails);
  const shouldThrow = options.throwOnFatal ?? true;

  const logger = getLogger();
  if (harvestError.severity === 'fatal') {
    logger.error({ err: harvestError, ...mergedDetails }, harvestError.message);
    console.error(chalk.red(message));
    if (shouldThrow) {
      throw harvestError;
    }
  } else {
    logger.warn({ err: harvestError, ...mergedDetails }, harvestError.message);
    console.warn(chalk.yellow(message));
  }

  return harvestError;
}

export function buildLogMessage(error: HarvestError, details: Record<string, unknown>): string {
  const parts = [`[${error.kind}/${error.severity}]`, error.message];
  const contextSuffix = serialiseDetails(details);

  if (contextSuffix) {
    parts.push(`(${contextSuffix})`);
  }

  return parts.join(' ');
}

function serialiseDetails(details: Record<string, unknown>): string | undefined {
  const entries = Object.entries(details).filter(([, value]) => value !== undefined);
  if (entries.length === 0) {
    return undefined;
  }

  entries.sort(([a], [b]) => a.localeCompare(b));
  return entries
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(' ');
}
