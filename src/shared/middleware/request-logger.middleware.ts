/**
 * =============================================================================
 * REQUEST LOGGER MIDDLEWARE
 * =============================================================================
 *
 * Logs every request once the response is finished.
 * Request bodies are not logged.
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';

// Query params to mask in logs
const SENSITIVE_PARAMS = ['token', 'key', 'secret', 'password'];

/**
 * Mask sensitive query parameters
 */
export function maskQueryParams(query: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(query)) {
    const isSensitive = SENSITIVE_PARAMS.some(param =>
      key.toLowerCase().includes(param)
    );
    masked[key] = isSensitive ? '[MASKED]' : value;
  }

  return masked;
}

type LogLevel = 'error' | 'warn' | 'info';

function levelFor(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

const MESSAGES: Record<LogLevel, string> = {
  error: 'Request failed',
  warn: 'Request rejected',
  info: 'Request completed',
};

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startedAt = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    const level = levelFor(res.statusCode);
    const hasQuery = Object.keys(req.query).length > 0;

    logger[level](MESSAGES[level], {
      method: req.method,
      path: req.originalUrl.split('?')[0],
      status: res.statusCode,
      duration: `${durationMs.toFixed(1)}ms`,
      ip: req.ip,
      requestId: res.getHeader('X-Request-ID'),
      userAgent: req.get('user-agent')?.substring(0, 100),
      ...(hasQuery && { query: maskQueryParams(req.query) }),
    });
  });

  next();
}
