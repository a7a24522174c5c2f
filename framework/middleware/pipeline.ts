/**
 * Middleware Pipeline
 *
 * An ordered list of middleware applied as one (onion model).
 * Each middleware can:
 * - Inspect/modify request before handler
 * - Short-circuit and return early response
 * - Inspect/modify response after handler
 *
 * The first middleware added is the outermost layer.
 */

import { type BaseEndpoint, toEndpoint } from '../endpoint/endpoint.ts';
import type { JunctionRequest } from '../http/request.ts';
import type { Endpoint, Middleware, MiddlewareFn } from '../http/types.ts';
import { compose, toMiddleware } from './compose.ts';

/**
 * Middleware pipeline for request processing
 */
export class MiddlewarePipeline implements Middleware {
  private middleware: Middleware[] = [];

  use(middleware: Middleware | MiddlewareFn): this {
    this.middleware.push(toMiddleware(middleware));
    return this;
  }

  /**
   * Add middleware at a specific position
   */
  useAt(index: number, middleware: Middleware | MiddlewareFn): this {
    this.middleware.splice(index, 0, toMiddleware(middleware));
    return this;
  }

  remove(middleware: Middleware): this {
    const index = this.middleware.indexOf(middleware);
    if (index !== -1) {
      this.middleware.splice(index, 1);
    }
    return this;
  }

  clear(): this {
    this.middleware = [];
    return this;
  }

  get length(): number {
    return this.middleware.length;
  }

  /**
   * Wrap `inner` with every middleware in the pipeline. The wrapping is
   * done now; later changes to the pipeline do not affect the result.
   * Errors thrown by a middleware's own endpoint become responses.
   */
  transform(inner: Endpoint): BaseEndpoint {
    if (this.middleware.length === 0) return toEndpoint(inner);
    return toEndpoint(compose(...this.middleware).transform(inner));
  }

  /**
   * Run one request through the pipeline and a final endpoint
   */
  async execute(req: JunctionRequest, finalHandler: Endpoint): Promise<Response> {
    return await this.transform(finalHandler).call(req);
  }
}

/**
 * Create a middleware that runs conditionally
 */
export function conditional(
  condition: (req: JunctionRequest) => boolean,
  middleware: Middleware | MiddlewareFn
): Middleware {
  const mw = toMiddleware(middleware);
  return {
    transform(inner: Endpoint): Endpoint {
      const wrapped = mw.transform(inner);
      return toEndpoint({
        call: (req: JunctionRequest) => (condition(req) ? wrapped.call(req) : inner.call(req)),
      });
    },
  };
}

/**
 * Create a middleware that runs for specific paths
 */
export function forPath(pathPrefix: string, middleware: Middleware | MiddlewareFn): Middleware {
  return conditional((req) => req.path.startsWith(pathPrefix), middleware);
}

/**
 * Create a middleware that runs for specific methods
 */
export function forMethods(methods: string[], middleware: Middleware | MiddlewareFn): Middleware {
  const methodSet = new Set(methods.map((m) => m.toUpperCase()));
  return conditional((req) => methodSet.has(req.method), middleware);
}
