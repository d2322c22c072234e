/**
 * =============================================================================
 * LOGGER SERVICE
 * =============================================================================
 *
 * Winston logger shared by the whole service.
 *
 * Metadata passes through sanitizeLogData before it is printed:
 * - credential-like keys are redacted
 * - long arrays (route coordinates, mesh cells) are collapsed to their length
 *
 * Console output everywhere, rotating files in production, nothing under test
 * unless LOG_IN_TESTS=true.
 * =============================================================================
 */

import winston from 'winston';
import { config } from '../../config/environment';

const REDACTED_KEYS = ['token', 'secret', 'password', 'apikey', 'authorization', 'cookie'];

/** Arrays longer than this are logged as "[Array(n)]" */
const MAX_LOGGED_ARRAY = 20;

const MAX_LOG_FILE_BYTES = 5 * 1024 * 1024;

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sanitizeValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.length > MAX_LOGGED_ARRAY
      ? `[Array(${value.length})]`
      : value.map(sanitizeValue);
  }
  return isPlainRecord(value) ? sanitizeLogData(value) : value;
}

/**
 * Redact credentials and collapse bulky geometry in log metadata
 */
export function sanitizeLogData(data: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    const lowered = key.toLowerCase();
    sanitized[key] = REDACTED_KEYS.some(k => lowered.includes(k))
      ? '[REDACTED]'
      : sanitizeValue(value);
  }

  return sanitized;
}

const lineFormat = winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
  const extra = sanitizeLogData(meta);
  const parts = [`${timestamp} [${level.toUpperCase()}]: ${message}`];

  if (Object.keys(extra).length > 0) {
    parts.push(JSON.stringify(extra));
  }

  const line = parts.join(' ');
  return stack ? `${line}\n${stack}` : line;
});

const baseFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  lineFormat
);

function fileTransports() {
  if (!config.isProduction) return [];

  return [
    new winston.transports.File({ filename: 'logs/error.log', level: 'error', maxsize: MAX_LOG_FILE_BYTES, maxFiles: 5 }),
    new winston.transports.File({ filename: 'logs/combined.log', maxsize: MAX_LOG_FILE_BYTES, maxFiles: 5 }),
  ];
}

export const logger = winston.createLogger({
  level: config.logLevel,
  format: baseFormat,
  silent: config.isTest && process.env.LOG_IN_TESTS !== 'true',
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), baseFormat),
    }),
    ...fileTransports(),
  ],
});
