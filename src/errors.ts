export type ErrorKind =
  | 'input'
  | 'connection'
  | 'tls'
  | 'timeout'
  | 'http-status'
  | 'transport'
  | 'config'
  | 'output'
  | 'internal';

export type ErrorSeverity = 'recoverable' | 'fatal';

export type FetchErrorKind = Extract<
  ErrorKind,
  'connection' | 'tls' | 'timeout' | 'http-status' | 'transport'
>;

export interface HarvestErrorProps {
  message: string;
  kind: ErrorKind;
  severity?: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class HarvestError extends Error {
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly details?: Record<string, unknown>;

  constructor({ message, kind, severity = 'recoverable', details, cause }: HarvestErrorProps) {
    super(message, cause ? { cause } : undefined);
    this.name = `${toPascalCase(kind)}Error`;
    this.kind = kind;
    this.severity = severity;
    this.details = details;
  }
}

export function isHarvestError(value: unknown): value is HarvestError {
  return value instanceof HarvestError;
}

export function ensureHarvestError(
  error: unknown,
  fallback: Partial<HarvestErrorProps> & Pick<HarvestErrorProps, 'kind'> = { kind: 'internal' },
): HarvestError {
  if (isHarvestError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new HarvestError({
    message,
    kind: fallback.kind,
    severity: fallback.severity ?? 'fatal',
    details: fallback.details,
    cause: error instanceof Error ? error : undefined,
  });
}

export function createInputError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): HarvestError {
  return new HarvestError({
    message,
    kind: 'input',
    severity: 'recoverable',
    details,
    cause: options.cause,
  });
}

/**
 * Fetch failures never stop a run, so they default to recoverable.
 */
export function createFetchError(
  message: string,
  kind: FetchErrorKind,
  details: Record<string, unknown> = {},
  options: { severity?: ErrorSeverity; cause?: unknown } = {},
): HarvestError {
  return new HarvestError({
    message,
    kind,
    severity: options.severity ?? 'recoverable',
    details,
    cause: options.cause,
  });
}

export function createConfigurationError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): HarvestError {
  return new HarvestError({
    message,
    kind: 'config',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

export function createOutputError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): HarvestError {
  return new HarvestError({
    message,
    kind: 'output',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

function toPascalCase(value: string): string {
  return value
    .split('-')
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');
}
