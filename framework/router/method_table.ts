/**
 * Method Table
 *
 * Maps HTTP methods to endpoints for one route. A route with a GET
 * endpoint and no HEAD endpoint answers HEAD through GET with the body
 * dropped.
 */

import { AfterEndpoint } from '../endpoint/endpoint.ts';
import type { Endpoint } from '../http/types.ts';
import { RegistrationError } from '../http/errors.ts';

export const HTTP_METHODS = [
  'GET',
  'POST',
  'PUT',
  'DELETE',
  'HEAD',
  'OPTIONS',
  'CONNECT',
  'PATCH',
  'TRACE',
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/** Any method */
export type MethodSelector = HttpMethod | '*';

const KNOWN_METHODS: ReadonlySet<string> = new Set(HTTP_METHODS);

export function isHttpMethod(value: string): value is HttpMethod {
  return KNOWN_METHODS.has(value);
}

/**
 * Parse a request method; unknown methods yield undefined
 */
export function parseMethod(method: string): HttpMethod | undefined {
  const upper = method.toUpperCase();
  return isHttpMethod(upper) ? upper : undefined;
}

/**
 * Per-route method → endpoint table, with an optional catch-all slot
 */
export class MethodTable {
  private readonly byMethod = new Map<HttpMethod, Endpoint>();
  private anyEndpoint: Endpoint | undefined;
  private headFallback: Endpoint | undefined;

  /**
   * Bind an endpoint; a taken slot is a registration error
   */
  set(method: MethodSelector, endpoint: Endpoint, pattern = ''): this {
    const conflict = this.conflicts(method);
    if (conflict.length > 0) {
      throw new RegistrationError(pattern, 'method is already registered', conflict.join(', '));
    }

    if (method === '*') {
      this.anyEndpoint = endpoint;
    } else {
      this.byMethod.set(method, endpoint);
    }
    return this;
  }

  get(method: string): Endpoint | undefined {
    const parsed = parseMethod(method);
    const found = (parsed && this.byMethod.get(parsed)) ?? this.anyEndpoint;
    if (found || parsed !== 'HEAD') return found;
    return this.headFromGet();
  }

  has(method: MethodSelector): boolean {
    return method === '*' ? this.anyEndpoint !== undefined : this.byMethod.has(method);
  }

  get isEmpty(): boolean {
    return this.byMethod.size === 0 && this.anyEndpoint === undefined;
  }

  get hasAny(): boolean {
    return this.anyEndpoint !== undefined;
  }

  /**
   * Selectors already taken that `method` would collide with
   */
  conflicts(method: MethodSelector): MethodSelector[] {
    if (this.anyEndpoint !== undefined) return ['*'];
    if (method === '*') return [...this.byMethod.keys()];
    return this.byMethod.has(method) ? [method] : [];
  }

  /**
   * Selectors on which this table and `other` collide
   */
  overlap(other: MethodTable): MethodSelector[] {
    return other.selectors().flatMap((selector) => this.conflicts(selector));
  }

  selectors(): MethodSelector[] {
    const selectors: MethodSelector[] = HTTP_METHODS.filter((m) => this.byMethod.has(m));
    if (this.anyEndpoint !== undefined) selectors.push('*');
    return selectors;
  }

  /**
   * Declared methods in canonical order; all of them with a catch-all
   */
  allowed(): HttpMethod[] {
    if (this.anyEndpoint !== undefined) return [...HTTP_METHODS];
    return HTTP_METHODS.filter(
      (m) => this.byMethod.has(m) || (m === 'HEAD' && this.byMethod.has('GET')),
    );
  }

  /**
   * Copy with every endpoint passed through `fn` (mounting wraps child routes)
   */
  map(fn: (endpoint: Endpoint) => Endpoint): MethodTable {
    const table = new MethodTable();
    for (const [method, endpoint] of this.byMethod) {
      table.byMethod.set(method, fn(endpoint));
    }
    if (this.anyEndpoint !== undefined) {
      table.anyEndpoint = fn(this.anyEndpoint);
    }
    return table;
  }

  private headFromGet(): Endpoint | undefined {
    if (this.headFallback) return this.headFallback;
    const get = this.byMethod.get('GET');
    if (!get) return undefined;
    this.headFallback = new AfterEndpoint(get, stripBody);
    return this.headFallback;
  }
}

function stripBody(response: Response): Response {
  return new Response(null, {
    status: response.status,
    statusText: response.statusText,
    headers: response.headers,
  });
}
