/**
 * Endpoints
 *
 * An endpoint answers a request with a response. Middleware wraps an
 * endpoint in another endpoint at construction time, so a composed chain
 * is a fixed set of nested objects built once at startup:
 *
 *   handler.with(A).with(B)   →   B(A(handler))
 *
 * B sees the request first and the response last.
 *
 * Every wrapper here catches what its function throws and turns it into a
 * response, so `call` always resolves to a Response.
 */

import { errorToResponse } from '../http/errors.ts';
import type { JunctionRequest } from '../http/request.ts';
import type {
  AfterFn,
  BeforeFn,
  Endpoint,
  EndpointLike,
  Handler,
  Middleware,
  MiddlewareFn,
} from '../http/types.ts';

/**
 * Base class giving every endpoint the composition methods
 */
export abstract class BaseEndpoint implements Endpoint {
  abstract call(req: JunctionRequest): Promise<Response>;

  /**
   * Wrap this endpoint with a middleware; the result is the outer endpoint
   */
  with(middleware: Middleware): BaseEndpoint {
    return toEndpoint(middleware.transform(this));
  }

  /**
   * Transform the request before it reaches this endpoint
   */
  before(fn: BeforeFn): BaseEndpoint {
    return new BeforeEndpoint(this, fn);
  }

  /**
   * Transform the response this endpoint produces
   */
  after(fn: AfterFn): BaseEndpoint {
    return new AfterEndpoint(this, fn);
  }

  /**
   * Wrap this endpoint with a function that controls the call
   */
  around(fn: MiddlewareFn): BaseEndpoint {
    return new AroundEndpoint(this, fn);
  }

  mapResponse(fn: AfterFn): BaseEndpoint {
    return this.after(fn);
  }
}

/**
 * Endpoint backed by a handler function
 */
export class HandlerEndpoint extends BaseEndpoint {
  constructor(private readonly handler: Handler) {
    super();
  }

  async call(req: JunctionRequest): Promise<Response> {
    try {
      return await this.handler(req);
    } catch (error) {
      return errorToResponse(error);
    }
  }
}

export class BeforeEndpoint extends BaseEndpoint {
  constructor(
    private readonly inner: Endpoint,
    private readonly fn: BeforeFn,
  ) {
    super();
  }

  async call(req: JunctionRequest): Promise<Response> {
    let next: JunctionRequest;
    try {
      next = await this.fn(req);
    } catch (error) {
      return errorToResponse(error);
    }
    return await this.inner.call(next);
  }
}

export class AfterEndpoint extends BaseEndpoint {
  constructor(
    private readonly inner: Endpoint,
    private readonly fn: AfterFn,
  ) {
    super();
  }

  async call(req: JunctionRequest): Promise<Response> {
    const response = await this.inner.call(req);
    try {
      return await this.fn(response);
    } catch (error) {
      return errorToResponse(error);
    }
  }
}

export class AroundEndpoint extends BaseEndpoint {
  constructor(
    private readonly inner: Endpoint,
    private readonly fn: MiddlewareFn,
  ) {
    super();
  }

  async call(req: JunctionRequest): Promise<Response> {
    try {
      return await this.fn(req, (next) => this.inner.call(next ?? req));
    } catch (error) {
      return errorToResponse(error);
    }
  }
}

/**
 * Adapts a plain Endpoint so it gets the composition methods
 */
class ForwardEndpoint extends BaseEndpoint {
  constructor(private readonly inner: Endpoint) {
    super();
  }

  async call(req: JunctionRequest): Promise<Response> {
    try {
      return await this.inner.call(req);
    } catch (error) {
      return errorToResponse(error);
    }
  }
}

export function isEndpoint(value: unknown): value is Endpoint {
  return (
    typeof value === 'object' &&
    value !== null &&
    'call' in value &&
    typeof value.call === 'function'
  );
}

/**
 * Create an endpoint from a handler function
 */
export function endpoint(handler: Handler): BaseEndpoint {
  return new HandlerEndpoint(handler);
}

/**
 * Accept either a handler function or an endpoint
 */
export function toEndpoint(value: EndpointLike): BaseEndpoint {
  if (value instanceof BaseEndpoint) return value;
  if (isEndpoint(value)) return new ForwardEndpoint(value);
  return new HandlerEndpoint(value);
}

