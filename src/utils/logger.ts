/**
 * CRM: Logging Utilities
 *
 * Structured logging using Pino with consistent formatting.
 *
 * @module utils/logger
 * @version 1.0.0
 */

import pino from 'pino';
import { getConfig } from '../config/config.js';

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER FACTORY
// ═══════════════════════════════════════════════════════════════════════════

export function createLogger(name: string): pino.Logger {
  const config = getConfig();

  const opts: pino.LoggerOptions = {
    name,
    level: config.logging.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  return pino(opts);
}

// ═══════════════════════════════════════════════════════════════════════════
// PRE-CONFIGURED LOGGERS
// ═══════════════════════════════════════════════════════════════════════════

export const apiLogger = createLogger('crm:api');

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function formatError(error: unknown): {
  message: string;
  stack?: string;
  code?: string;
  name?: string;
} {
  if (error instanceof Error) {
    const result: { message: string; stack?: string; code?: string; name?: string } = {
      message: error.message,
      name: error.name,
    };
    if (error.stack !== undefined) {
      result.stack = error.stack;
    }
    if ('code' in error && typeof error.code === 'string') {
      result.code = error.code;
    }
    return result;
  }

  return { message: String(error) };
}
