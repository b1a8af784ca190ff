/**
 * Sanitized Structured Logger
 *
 * One JSON object per line, PII stripped from both message and data.
 *
 * Usage:
 *   import { createLogger } from '@/lib/security/logger';
 *   const log = createLogger('order-completion');
 *   log.info('Order completed', { orderId });
 *   log.error('Capture failed', { orderId, error: err.message });
 */

import { sanitizePII, sanitizeObject } from './sanitizer';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  service: string;
  message: string;
  data?: unknown;
  timestamp: string;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

/**
 * Minimum level from LOG_LEVEL, read on every call so tests and long-lived
 * workers pick up changes.
 */
export function minLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env.LOG_LEVEL?.toLowerCase().trim();
  if (isLogLevel(configured)) return configured;
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export function createLogger(service: string): Logger {
  function log(level: LogLevel, message: string, data?: unknown) {
    if (LOG_LEVELS[level] < LOG_LEVELS[minLogLevel()]) return;

    const entry: LogEntry = {
      level,
      service,
      message: sanitizePII(message),
      timestamp: new Date().toISOString(),
    };

    if (data !== undefined) {
      entry.data = sanitizeObject(data);
    }

    const output = JSON.stringify(entry);

    switch (level) {
      case 'error':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      default:
        console.log(output);
    }
  }

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  };
}

/** Extract a loggable message from an unknown thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
