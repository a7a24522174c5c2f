/**
 * Request Wrapper
 *
 * Wraps the native Request with the routing information handlers need:
 * captured path parameters, the path as seen by the handler (prefix-stripped
 * under mounts) and request-scoped state shared by middleware.
 */

import { PathParams } from '../router/params.ts';

/**
 * State key under which the router records the matched route pattern, so
 * middleware outside the router can read it after the call returns
 */
export const MATCHED_ROUTE = 'junction.route';

export interface RequestContext {
  params: PathParams;
  /** Path presented to the handler; differs from the URL path under stripped mounts */
  path: string;
  routePattern?: string;
  state: Map<string, unknown>;
  startTime: number;
}

/**
 * Request passed through endpoints and middleware
 */
export class JunctionRequest {
  private _request: Request;
  private _url: URL;
  private _context: RequestContext;

  constructor(request: Request, context?: Partial<RequestContext>) {
    this._request = request;
    this._url = new URL(request.url);
    this._context = {
      params: context?.params ?? PathParams.empty(),
      path: context?.path ?? this._url.pathname,
      routePattern: context?.routePattern,
      state: context?.state ?? new Map(),
      startTime: context?.startTime ?? performance.now(),
    };
  }

  /**
   * Build a request from a URL or path, for tests and in-process calls
   */
  static from(input: string | URL, init?: RequestInit): JunctionRequest {
    const url = typeof input === 'string' && input.startsWith('/')
      ? new URL(input, 'http://localhost')
      : input;
    return new JunctionRequest(new Request(url, init));
  }

  /**
   * The underlying native Request (body handle)
   */
  get raw(): Request {
    return this._request;
  }

  get method(): string {
    return this._request.method;
  }

  get url(): string {
    return this._request.url;
  }

  /**
   * Path seen by the current handler
   */
  get path(): string {
    return this._context.path;
  }

  /**
   * Path as received, before any prefix stripping
   */
  get originalPath(): string {
    return this._url.pathname;
  }

  /**
   * Host the request was sent to, from the Host header or the URL
   */
  get host(): string {
    return this.header('Host') ?? this._url.host;
  }

  /**
   * URL scheme without the colon, e.g. `https`
   */
  get scheme(): string {
    return this._url.protocol.slice(0, -1);
  }

  get query(): URLSearchParams {
    return this._url.searchParams;
  }

  get params(): PathParams {
    return this._context.params;
  }

  /**
   * A captured path parameter by name
   */
  param(name: string): string | undefined {
    return this._context.params.get(name);
  }

  /**
   * Pattern of the route that matched, once routed
   */
  get routePattern(): string | undefined {
    return this._context.routePattern;
  }

  get headers(): Headers {
    return this._request.headers;
  }

  header(name: string): string | null {
    return this._request.headers.get(name);
  }

  /**
   * Request state for passing data between middleware
   */
  get state(): Map<string, unknown> {
    return this._context.state;
  }

  get startTime(): number {
    return this._context.startTime;
  }

  /**
   * Get the client IP address (accounting for proxies)
   */
  get ip(): string {
    return (
      this.header('X-Forwarded-For')?.split(',')[0]?.trim() ??
      this.header('X-Real-IP') ??
      'unknown'
    );
  }

  async json(): Promise<unknown> {
    return await this._request.json();
  }

  async text(): Promise<string> {
    return await this._request.text();
  }

  /**
   * Derive the request seen by a routed handler. State is shared with the
   * original so data set by outer middleware stays visible.
   */
  withRoute(params: PathParams, path: string, routePattern: string): JunctionRequest {
    return this.derive({ params, path, routePattern });
  }

  /**
   * Same request with a different handler path
   */
  withPath(path: string): JunctionRequest {
    return this.derive({ path });
  }

  private derive(overrides: Partial<RequestContext>): JunctionRequest {
    return new JunctionRequest(this._request, { ...this._context, ...overrides });
  }
}
