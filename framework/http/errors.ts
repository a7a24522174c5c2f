/**
 * Error Types
 *
 * Build-time errors (bad patterns, conflicting routes) are thrown and stop
 * startup. Request-time errors are turned into responses so every endpoint
 * resolves to a Response.
 */

import { getLogger } from '../telemetry/logger.ts';

/**
 * Base class for errors raised by Junction
 */
export class JunctionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A route pattern could not be compiled
 */
export class CompileError extends JunctionError {
  readonly pattern: string;
  readonly reason: string;

  constructor(pattern: string, reason: string) {
    super(`Invalid route pattern "${pattern}": ${reason}`);
    this.pattern = pattern;
    this.reason = reason;
  }
}

/**
 * A route could not be added to a router
 */
export class RegistrationError extends JunctionError {
  readonly pattern: string;
  readonly method?: string;
  readonly reason: string;

  constructor(pattern: string, reason: string, method?: string) {
    const target = method ? `${method} ${pattern}` : pattern;
    super(`Cannot register "${target}": ${reason}`);
    this.pattern = pattern;
    this.method = method;
    this.reason = reason;
  }
}

/**
 * A configuration file or environment value is malformed
 */
export class ConfigError extends JunctionError {
  readonly source: string;

  constructor(source: string, reason: string) {
    super(`Invalid configuration in ${source}: ${reason}`);
    this.source = source;
  }
}

/**
 * An error carrying an HTTP status, thrown from handlers or middleware
 */
export class HttpError extends JunctionError {
  readonly status: number;
  readonly headers: Record<string, string>;

  constructor(status: number, message?: string, headers: Record<string, string> = {}) {
    super(message ?? STATUS_TEXT[status] ?? `HTTP ${status}`);
    this.status = status;
    this.headers = headers;
  }

  static badRequest(message?: string): HttpError {
    return new HttpError(400, message);
  }

  static unauthorized(message?: string): HttpError {
    return new HttpError(401, message);
  }

  static forbidden(message?: string): HttpError {
    return new HttpError(403, message);
  }

  static notFound(message?: string): HttpError {
    return new HttpError(404, message);
  }

  static methodNotAllowed(allowed: readonly string[]): HttpError {
    return new HttpError(405, undefined, { Allow: allowed.join(', ') });
  }
}

export const STATUS_TEXT: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  405: 'Method Not Allowed',
  500: 'Internal Server Error',
};

/**
 * Convert anything thrown during a request into a Response.
 * Unknown errors become a 500 and are logged.
 */
export function errorToResponse(error: unknown): Response {
  if (error instanceof HttpError) {
    return Response.json(
      { error: error.message },
      { status: error.status, headers: error.headers },
    );
  }

  const err = error instanceof Error ? error : new Error(String(error));
  getLogger().error('Unhandled error while handling request', err);

  return Response.json({ error: STATUS_TEXT[500] }, { status: 500 });
}
