import pino from 'pino';
import { getConfig } from '../config/app-config.js';
import { SERVICE_NAME, SERVICE_VERSION } from '../config.js';

export interface LogContext {
  requestId?: string;
  operation?: string;
  model?: string;
  duration?: number;
  module?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(message: string, meta?: LogContext): void;
  error(message: string, error?: unknown, meta?: LogContext): void;
  warn(message: string, meta?: LogContext): void;
  debug(message: string, meta?: LogContext): void;
  timer(operation: string): () => void;
}

export interface LoggerOptions {
  level?: string;
  /** Append JSON lines to this file instead of stdout. */
  file?: string;
  /** Explicit destination, mostly for tests. Wins over `file`. */
  destination?: pino.DestinationStream;
}

export const REDACTED_PATHS = [
  'apiKey',
  'api_key',
  'token',
  'password',
  'authorization',
  'headers.authorization',
  'headers.Authorization',
];

class PinoLogger implements Logger {
  constructor(private readonly p: pino.Logger) {}

  info(message: string, meta?: LogContext): void {
    this.p.info(meta || {}, message);
  }
  error(message: string, error?: unknown, meta?: LogContext): void {
    const logData = error === undefined ? { ...meta } : { ...meta, err: error };
    this.p.error(logData, message);
  }
  warn(message: string, meta?: LogContext): void {
    this.p.warn(meta || {}, message);
  }
  debug(message: string, meta?: LogContext): void {
    this.p.debug(meta || {}, message);
  }
  timer(operation: string): () => void {
    const start = Date.now();
    return () => this.debug('Operation completed', { operation, duration: Date.now() - start });
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const baseOpts: pino.LoggerOptions = {
    level: options.level || 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: { level: (label) => ({ level: label }) },
    redact: { paths: REDACTED_PATHS, censor: '***' },
    serializers: { err: pino.stdSerializers.err },
    base: { service: SERVICE_NAME, version: SERVICE_VERSION },
  };

  const destination = options.destination
    ?? (options.file ? pino.destination({ dest: options.file, mkdir: true, sync: false }) : pino.destination(1));

  return new PinoLogger(pino(baseOpts, destination));
}

let defaultLogger: Logger | undefined;

/**
 * Logger for components that are not handed one. Built on first use from
 * `LOG_LEVEL` / `LOG_FILE`, so importing a module never reads config or
 * opens a destination.
 */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    const { logging } = getConfig();
    defaultLogger = createLogger({ level: logging.level, file: logging.file });
  }
  return defaultLogger;
}

/** Drops the cached default logger. Intended for tests. */
export function resetDefaultLogger(): void {
  defaultLogger = undefined;
}
