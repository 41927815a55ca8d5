/**
 * Structured JSON Logger.
 *
 * - Outputs JSON for easy parsing
 * - Truncates long strings (TXT payloads are attacker-controlled)
 * - Includes request IDs for tracing
 */

import { config } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  request_id?: string;
  [key: string]: unknown;
}

/**
 * Longest string value written as-is.
 */
const MAX_VALUE_LENGTH = 300;

/**
 * Truncate long strings anywhere in a value.
 */
export function truncateValues(value: unknown): unknown {
  if (typeof value === 'string') {
    if (value.length <= MAX_VALUE_LENGTH) return value;
    return `${value.slice(0, MAX_VALUE_LENGTH)}…[${value.length - MAX_VALUE_LENGTH} more]`;
  }

  if (Array.isArray(value)) {
    return value.map(truncateValues);
  }

  if (value && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      out[key] = truncateValues(val);
    }
    return out;
  }

  return value;
}

/**
 * Log level priority for filtering.
 */
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[config.logLevel];
}

/**
 * Generate a unique request ID.
 */
export function generateRequestId(): string {
  return `req_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Current request context (for tracing).
 */
let currentRequestId: string | undefined;

export function setRequestId(id: string): void {
  currentRequestId = id;
}

export function clearRequestId(): void {
  currentRequestId = undefined;
}

/**
 * Core logging function.
 */
function log(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>,
): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  if (currentRequestId) {
    entry.request_id = currentRequestId;
  }

  if (data) {
    for (const [key, val] of Object.entries(data)) {
      entry[key] = truncateValues(val);
    }
  }

  // stderr: stdout carries the MCP protocol
  console.error(JSON.stringify(entry));
}

/**
 * Logger instance with convenience methods.
 */
export const logger = {
  debug: (message: string, data?: Record<string, unknown>) =>
    log('debug', message, data),
  info: (message: string, data?: Record<string, unknown>) =>
    log('info', message, data),
  warn: (message: string, data?: Record<string, unknown>) =>
    log('warn', message, data),
  error: (message: string, data?: Record<string, unknown>) =>
    log('error', message, data),

  /**
   * Log an error with stack trace.
   */
  logError: (message: string, error: Error, data?: Record<string, unknown>) => {
    log('error', message, {
      ...data,
      error_name: error.name,
      error_message: error.message,
      error_stack: error.stack,
    });
  },
};
