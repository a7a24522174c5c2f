/**
 * Logging Middleware
 *
 * Request/response logging for monitoring and debugging. Lines go through
 * the structured Logger; the response line's level follows the status
 * (5xx error, 4xx warn, otherwise info).
 */

import { randomUUID } from 'node:crypto';
import { MATCHED_ROUTE } from '../http/request.ts';
import type { Middleware } from '../http/types.ts';
import { createRequestLogger, getLogger, type Logger, type LogLevel } from '../telemetry/logger.ts';
import { around } from './compose.ts';

export interface LoggingOptions {
  /** Defaults to the process logger at call time */
  logger?: Logger;
  logRequest?: boolean;
  logResponse?: boolean;
  logHeaders?: boolean;
  /** Path prefixes that are not logged */
  excludePaths?: string[];
}

const DEFAULT_OPTIONS: Required<Omit<LoggingOptions, 'logger'>> = {
  logRequest: false,
  logResponse: true,
  logHeaders: false,
  excludePaths: ['/health', '/ready', '/favicon.ico'],
};

/**
 * Create logging middleware
 */
export function logging(options: LoggingOptions = {}): Middleware {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return around(async (req, next) => {
    const path = req.originalPath;

    if (opts.excludePaths.some((prefix) => path.startsWith(prefix))) {
      return await next();
    }

    const log = createRequestLogger(opts.logger ?? getLogger(), {
      requestId: req.header('X-Request-Id') ?? randomUUID(),
      method: req.method,
      path,
      userAgent: req.header('User-Agent') ?? undefined,
      ip: req.ip,
    });

    if (opts.logRequest) {
      log.info(`→ ${req.method} ${path}`, opts.logHeaders
        ? { headers: Object.fromEntries(req.headers.entries()) }
        : undefined);
    }

    const startTime = performance.now();
    const response = await next();
    const duration = Math.round((performance.now() - startTime) * 100) / 100;

    if (opts.logResponse) {
      const route = req.state.get(MATCHED_ROUTE);
      log.at(levelForStatus(response.status), `← ${req.method} ${path} ${response.status}`, {
        status: response.status,
        duration,
        route: typeof route === 'string' ? route : undefined,
      });
    }

    return response;
  });
}

export function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}
