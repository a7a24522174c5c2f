/**
 * Middleware Constructors
 *
 * Build middleware from plain functions:
 * - before: rewrites the request only
 * - after: rewrites the response only
 * - around: sees both and may answer without calling the inner endpoint
 */

import { AfterEndpoint, AroundEndpoint, BeforeEndpoint } from '../endpoint/endpoint.ts';
import type { AfterFn, BeforeFn, Endpoint, Middleware, MiddlewareFn } from '../http/types.ts';

export function before(fn: BeforeFn): Middleware {
  return { transform: (inner: Endpoint) => new BeforeEndpoint(inner, fn) };
}

export function after(fn: AfterFn): Middleware {
  return { transform: (inner: Endpoint) => new AfterEndpoint(inner, fn) };
}

export function around(fn: MiddlewareFn): Middleware {
  return { transform: (inner: Endpoint) => new AroundEndpoint(inner, fn) };
}

/**
 * Accept a middleware object or an around-style function
 */
export function toMiddleware(value: Middleware | MiddlewareFn): Middleware {
  return typeof value === 'function' ? around(value) : value;
}

/**
 * Fold middleware into one. The first in the list ends up outermost, so
 * it runs first on the way in and last on the way out.
 */
export function compose(...middleware: Middleware[]): Middleware {
  return {
    transform(inner: Endpoint): Endpoint {
      return middleware.reduceRight<Endpoint>((ep, mw) => mw.transform(ep), inner);
    },
  };
}
