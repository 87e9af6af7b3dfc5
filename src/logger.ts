import pino, { type DestinationStream, type Level } from 'pino';

/** The slice of pino the harvester writes diagnostics through. */
export interface LoggerLike {
  debug(bindings: object, message: string): void;
  info(bindings: object, message: string): void;
  warn(bindings: object, message: string): void;
  error(bindings: object, message: string): void;
}

export type LogLevel = Level | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LoggerConfiguration {
  level?: LogLevel;
  destination?: DestinationStream;
}

// Diagnostics stay off stdout, which carries the harvested links.
function createHarvestLogger({
  level = 'silent',
  destination = process.stderr,
}: LoggerConfiguration): LoggerLike {
  return pino({ level, base: { service: 'link-harvester' } }, destination);
}

let activeLogger = createHarvestLogger({});

/** Replaces the process-wide logger; called with no argument it restores the silent default. */
export function configureLogger(config: LoggerConfiguration = {}): void {
  activeLogger = createHarvestLogger(config);
}

export function setLoggerInstance(logger: LoggerLike): void {
  activeLogger = logger;
}

export function getLogger(): LoggerLike {
  return activeLogger;
}
