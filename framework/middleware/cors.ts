/**
 * CORS Middleware
 *
 * Handles Cross-Origin Resource Sharing (CORS) headers
 * and preflight OPTIONS requests.
 */

import { JunctionResponse, withHeaders } from '../http/response.ts';
import type { Middleware } from '../http/types.ts';
import { around } from './compose.ts';

export interface CorsOptions {
  origin?: string | string[] | ((origin: string) => boolean);
  methods?: string[];
  allowedHeaders?: string[];
  exposedHeaders?: string[];
  credentials?: boolean;
  maxAge?: number;
}

const DEFAULT_OPTIONS: Required<CorsOptions> = {
  origin: '*',
  methods: ['GET', 'HEAD', 'PUT', 'PATCH', 'POST', 'DELETE'],
  allowedHeaders: ['Content-Type', 'Authorization'],
  exposedHeaders: [],
  credentials: false,
  maxAge: 86400, // 24 hours
};

/**
 * Create CORS middleware. Preflight requests are answered here with 204;
 * other responses, 404 and 405 included, get the CORS headers added.
 */
export function cors(options: CorsOptions = {}): Middleware {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return around(async (req, next) => {
    const origin = req.header('Origin');
    const allowedOrigin = getOriginHeader(origin, opts.origin);

    const common = (headers: Headers): void => {
      if (allowedOrigin) {
        headers.set('Access-Control-Allow-Origin', allowedOrigin);
        if (allowedOrigin !== '*') headers.append('Vary', 'Origin');
      }
      if (opts.credentials) {
        headers.set('Access-Control-Allow-Credentials', 'true');
      }
    };

    // Preflight
    if (req.method === 'OPTIONS' && req.header('Access-Control-Request-Method')) {
      const res = new JunctionResponse({ status: 204 })
        .header('Access-Control-Allow-Methods', opts.methods.join(', '))
        .header('Access-Control-Allow-Headers', opts.allowedHeaders.join(', '));

      if (opts.maxAge) {
        res.header('Access-Control-Max-Age', opts.maxAge.toString());
      }
      return withHeaders(res.empty(), common);
    }

    const response = await next();
    return withHeaders(response, (headers) => {
      common(headers);
      if (allowedOrigin && opts.exposedHeaders.length > 0) {
        headers.set('Access-Control-Expose-Headers', opts.exposedHeaders.join(', '));
      }
    });
  });
}

/**
 * Determine the Access-Control-Allow-Origin header value
 */
function getOriginHeader(origin: string | null, allowed: CorsOptions['origin']): string | null {
  if (!origin) return null;

  if (allowed === '*') {
    return '*';
  }

  if (typeof allowed === 'string') {
    return origin === allowed ? allowed : null;
  }

  if (Array.isArray(allowed)) {
    return allowed.includes(origin) ? origin : null;
  }

  if (typeof allowed === 'function') {
    return allowed(origin) ? origin : null;
  }

  return null;
}
