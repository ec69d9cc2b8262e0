import pino, { type Logger } from 'pino';

export interface TelemetryContext {
  runId?: string;
  source?: string;
  sourceFile?: string;
  targetFile?: string;
}

export interface TelemetryLogger {
  logPassStart(pass: string, details?: Record<string, unknown>): void;
  logPassComplete(pass: string, details?: Record<string, unknown>): void;
  logDecision(message: string, details?: Record<string, unknown>): void;
  logSummary(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
}

const baseLogger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: undefined,
});

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/** Adjust verbosity at run time (the CLI's --verbose / --quiet flags). */
export function setLogLevel(level: LogLevel): void {
  baseLogger.level = level;
}

export function createTelemetryLogger(
  scope: string,
  context: TelemetryContext = {},
  parent: Logger = baseLogger
): TelemetryLogger {
  const logger = parent.child({ scope, ...context });

  return {
    logPassStart(pass, details = {}) {
      logger.info({ event: 'pass_start', pass, ...details }, `Matching pass start: ${pass}`);
    },
    logPassComplete(pass, details = {}) {
      logger.info({ event: 'pass_complete', pass, ...details }, `Matching pass complete: ${pass}`);
    },
    logDecision(message, details = {}) {
      logger.debug({ event: 'decision', ...details }, message);
    },
    logSummary(message, details = {}) {
      logger.info({ event: 'summary', ...details }, message);
    },
    info(message, details = {}) {
      logger.info(details, message);
    },
    warn(message, details = {}) {
      logger.warn(details, message);
    },
    error(message, details = {}) {
      logger.error(details, message);
    },
  };
}
