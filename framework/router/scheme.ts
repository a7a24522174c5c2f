/**
 * Scheme Router
 *
 * Dispatches on the URL scheme, e.g. to serve the application over https
 * and answer plain http with a redirect:
 *
 *   new SchemeRouter().https(app).fallback(upgrade);
 */

import { BaseEndpoint, toEndpoint } from '../endpoint/endpoint.ts';
import { RegistrationError } from '../http/errors.ts';
import type { JunctionRequest } from '../http/request.ts';
import { JunctionResponse } from '../http/response.ts';
import type { Endpoint, EndpointLike } from '../http/types.ts';

export class SchemeRouter extends BaseEndpoint {
  private readonly schemes = new Map<string, Endpoint>();
  private fallbackEndpoint?: Endpoint;

  https(handler: EndpointLike): this {
    return this.custom('https', handler);
  }

  http(handler: EndpointLike): this {
    return this.custom('http', handler);
  }

  /**
   * Register an endpoint for any scheme, compared case-insensitively
   */
  custom(scheme: string, handler: EndpointLike): this {
    const key = scheme.toLowerCase().replace(/:$/, '');
    if (this.schemes.has(key)) {
      throw new RegistrationError(key, 'scheme is already registered');
    }
    this.schemes.set(key, toEndpoint(handler));
    return this;
  }

  /**
   * Endpoint for requests whose scheme has none registered
   */
  fallback(handler: EndpointLike): this {
    this.fallbackEndpoint = toEndpoint(handler);
    return this;
  }

  resolve(scheme: string): Endpoint | undefined {
    return this.schemes.get(scheme.toLowerCase()) ?? this.fallbackEndpoint;
  }

  async call(req: JunctionRequest): Promise<Response> {
    const endpoint = this.resolve(req.scheme);
    if (!endpoint) {
      return new JunctionResponse().notFound();
    }
    return await endpoint.call(req);
  }
}
