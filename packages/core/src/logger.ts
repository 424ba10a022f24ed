/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include correlation IDs from AsyncLocalStorage context
 */

import { getCorrelationId, getContext } from './context';
import { config } from './config';

export interface LogContext {
  [key: string]: unknown;
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const reqContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    requestId: reqContext?.requestId,
    domain: reqContext?.domain,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

// Unrecognised LOG_LEVEL values behave like info
function threshold(): number {
  const level = config.logLevel.toLowerCase();
  return isLogLevel(level) ? LEVEL_ORDER[level] : LEVEL_ORDER.info;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= threshold();
}

// Debug lines also show at info outside production
function debugEnabled(): boolean {
  if (enabled('debug')) return true;
  return threshold() === LEVEL_ORDER.info && process.env.NODE_ENV !== 'production';
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (!enabled('info')) return;
    console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (!enabled('warn')) return;
    console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    if (!enabled('error')) return;
    const errorContext = {
      ...context,
      error:
        error instanceof Error
          ? {
              message: error.message,
              stack: error.stack,
              name: error.name,
            }
          : String(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (debugEnabled()) {
      console.debug(formatLog('DEBUG', message, context));
    }
  },
};
