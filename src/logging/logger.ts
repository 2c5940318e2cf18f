// src/logging/logger.ts
import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

const IS_TEST_ENV =
  process.env['NODE_ENV'] === 'test' ||
  process.env['VITEST'] === 'true' ||
  process.env['VITEST_WORKER_ID'] !== undefined;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerConfig {
  level?: LogLevel;
  /** Output file path (default: stdout) */
  file?: string;
  /** Takes precedence over `file` */
  destination?: DestinationStream;
  name?: string;
}

// Credential instances mask themselves through toJSON; these cover plain objects and TOML tables.
export const REDACTED_PATHS = [
  'applicationSecret',
  'consumerKey',
  'application_secret',
  'consumer_key',
  '*.application_secret',
  '*.consumer_key',
];

const DEFAULT_LEVEL: LogLevel = IS_TEST_ENV ? 'silent' : 'warn';

let globalLogger: Logger | null = null;

export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    level: config.level ?? DEFAULT_LEVEL,
    name: config.name,
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACTED_PATHS, censor: '***' },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (config.destination) {
    return pino(options, config.destination);
  }
  if (config.file) {
    return pino(options, pino.destination({ dest: config.file, sync: true }));
  }
  return pino(options);
}

export function getLogger(name?: string): Logger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return name ? globalLogger.child({ component: name }) : globalLogger;
}

export function configureLogger(config: LoggerConfig): void {
  globalLogger = createLogger(config);
}

/** For tests. */
export function resetLogger(): void {
  globalLogger = null;
}
