/**
 * URL Router
 *
 * Route registry built on a segment trie. Routes are registered during
 * startup; the first request (or an explicit `freeze()`) closes the router
 * and from then on it is read-only.
 *
 * Every matching route competes on specificity, so the outcome never
 * depends on registration order:
 *
 *   router.get('/users/:id', show);
 *   router.get('/users/active', active);   // wins for /users/active
 *
 * The router is itself an endpoint. Unmatched requests are answered by
 * terminal endpoints (404, or 405 with `Allow`) that run through the same
 * router-level middleware as routed ones.
 */

import { BaseEndpoint, toEndpoint } from '../endpoint/endpoint.ts';
import { CompileError, RegistrationError } from '../http/errors.ts';
import { MATCHED_ROUTE, type JunctionRequest } from '../http/request.ts';
import { JunctionResponse } from '../http/response.ts';
import type { Endpoint, EndpointLike, Middleware, MiddlewareFn } from '../http/types.ts';
import type { Config } from '../config/config.ts';
import { compose, toMiddleware } from '../middleware/compose.ts';
import { MiddlewarePipeline } from '../middleware/pipeline.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import { setRouteAttribute } from '../telemetry/otel.ts';
import { splitPath } from './matcher.ts';
import { HTTP_METHODS, isHttpMethod, MethodTable, type HttpMethod, type MethodSelector } from './method_table.ts';
import { PathParams } from './params.ts';
import { buildPath, compile, joinPatterns, type Pattern } from './pattern.ts';
import { compareSpecificity, RouteTrie, type RegexPrecedence, type RouteEntry } from './trie.ts';

export interface RouterOptions {
  /** Compare literal segments case-insensitively */
  ignoreCase?: boolean;
  /** Which wins between a regex capture and a plain capture at the same position */
  regexPrecedence?: RegexPrecedence;
  logger?: Logger;
}

export interface RouteOptions {
  name?: string;
  middleware?: (Middleware | MiddlewareFn)[];
  meta?: Record<string, unknown>;
}

export interface MountOptions {
  /** Hide the prefix from the path mounted handlers see (default true) */
  strip?: boolean;
}

export type Resolution =
  | {
      kind: 'resolved';
      endpoint: Endpoint;
      params: PathParams;
      route: RouteEntry;
      /** Path presented to the handler */
      path: string;
    }
  | { kind: 'not-found' }
  | { kind: 'method-not-allowed'; allowed: HttpMethod[] };

export type MethodHandlers = Partial<Record<MethodSelector, EndpointLike>>;

const notFound = toEndpoint(() => new JunctionResponse().notFound());

/** Appended to a prefix to mount an endpoint on it and everything below */
const REST = compile('/*');

/**
 * URL Router for Junction
 */
export class Router extends BaseEndpoint {
  private readonly trie: RouteTrie;
  private readonly pipeline = new MiddlewarePipeline();
  private readonly namedRoutes = new Map<string, RouteEntry>();
  private fallbackEndpoint: Endpoint = notFound;
  private dispatcher: Endpoint | undefined;
  private nextOrder = 0;

  constructor(private readonly settings: RouterOptions = {}) {
    super();
    this.trie = new RouteTrie({
      ignoreCase: settings.ignoreCase,
      regexPrecedence: settings.regexPrecedence,
    });
  }

  /**
   * Build a router from the `router` section of a configuration
   */
  static fromConfig(config: Config, logger?: Logger): Router {
    const { ignoreCase, regexPrecedence } = config.all().router;
    return new Router({ ignoreCase, regexPrecedence, logger });
  }

  private get logger(): Logger {
    return this.settings.logger ?? getLogger();
  }

  get frozen(): boolean {
    return this.dispatcher !== undefined;
  }

  /**
   * Add router-level middleware. It wraps the whole dispatch, so it also
   * sees 404 and 405 responses.
   */
  use(middleware: Middleware | MiddlewareFn): this {
    this.assertOpen('use');
    this.pipeline.use(middleware);
    return this;
  }

  get(path: string, handler: EndpointLike, options?: RouteOptions): this {
    return this.register('GET', path, handler, options);
  }

  post(path: string, handler: EndpointLike, options?: RouteOptions): this {
    return this.register('POST', path, handler, options);
  }

  put(path: string, handler: EndpointLike, options?: RouteOptions): this {
    return this.register('PUT', path, handler, options);
  }

  delete(path: string, handler: EndpointLike, options?: RouteOptions): this {
    return this.register('DELETE', path, handler, options);
  }

  head(path: string, handler: EndpointLike, options?: RouteOptions): this {
    return this.register('HEAD', path, handler, options);
  }

  options(path: string, handler: EndpointLike, options?: RouteOptions): this {
    return this.register('OPTIONS', path, handler, options);
  }

  connect(path: string, handler: EndpointLike, options?: RouteOptions): this {
    return this.register('CONNECT', path, handler, options);
  }

  patch(path: string, handler: EndpointLike, options?: RouteOptions): this {
    return this.register('PATCH', path, handler, options);
  }

  trace(path: string, handler: EndpointLike, options?: RouteOptions): this {
    return this.register('TRACE', path, handler, options);
  }

  /**
   * Register a route for all methods
   */
  all(path: string, handler: EndpointLike, options?: RouteOptions): this {
    return this.register('*', path, handler, options);
  }

  /**
   * Register one handler for one or more methods
   */
  register(
    method: MethodSelector | readonly MethodSelector[],
    path: string,
    handler: EndpointLike,
    options: RouteOptions = {},
  ): this {
    const methods = typeof method === 'string' ? [method] : method;
    const ep = this.wrap(toEndpoint(handler), options);
    const handlers: MethodHandlers = {};
    for (const m of methods) {
      handlers[m] = ep;
    }
    return this.at(path, handlers, { name: options.name, meta: options.meta });
  }

  /**
   * Register a different handler per method on one pattern:
   *
   *   router.at('/users/:id', { GET: show, DELETE: remove });
   */
  at(path: string, handlers: MethodHandlers, options: RouteOptions = {}): this {
    const selectors = Object.keys(handlers).filter(isSelector);
    this.assertOpen(path, selectors.join(', '));

    const pattern = compile(path);
    const methods = new MethodTable();

    for (const selector of selectors) {
      const handler = handlers[selector];
      if (handler !== undefined) {
        methods.set(selector, this.wrap(toEndpoint(handler), options), pattern.source);
      }
    }
    if (methods.isEmpty) {
      throw new RegistrationError(pattern.source, 'no methods given');
    }

    this.add([{ pattern, methods, name: options.name, meta: options.meta, strip: [] }]);
    return this;
  }

  /**
   * Mount `child` under `prefix`. With `strip` (the default) handlers see
   * their path without the prefix.
   *
   * A child router is frozen and its routes are copied, so they compete
   * with this router's routes on specificity; its router-level middleware
   * wraps each copied handler. It must use the same `ignoreCase` and
   * `regexPrecedence` settings as this router.
   *
   * Any other endpoint answers every method on the prefix and everything
   * below it.
   */
  mount(prefix: string, child: EndpointLike, options: MountOptions = {}): this {
    this.assertOpen(prefix);
    if (child === this) {
      throw new RegistrationError(prefix, 'a router cannot be mounted on itself');
    }

    const head = compile(prefix);
    if (head.hasWildcard) {
      throw new RegistrationError(head.source, 'a mount prefix cannot contain a wildcard');
    }

    const strip = options.strip ?? true;
    const prefixStrip = strip ? head.segments.map((_, i) => i) : [];

    if (!(child instanceof Router)) {
      const pattern = this.join(head, REST);
      const methods = new MethodTable().set('*', toEndpoint(child), pattern.source);
      this.add([{ pattern, methods, strip: prefixStrip }]);
      this.logger.debug('Endpoint mounted', { prefix: head.source, strip });
      return this;
    }

    const differing = this.settingsDiffer(child);
    if (differing.length > 0) {
      throw new RegistrationError(
        head.source,
        `mounted router differs in ${differing.join(' and ')}`,
      );
    }

    child.freeze();
    const shift = head.segments.length;

    const entries = child.routes().map((entry) => ({
      pattern: this.join(head, entry.pattern),
      methods: child.pipeline.length > 0
        ? entry.methods.map((ep) => child.pipeline.transform(ep))
        : entry.methods,
      name: entry.name,
      meta: entry.meta,
      strip: [...prefixStrip, ...entry.strip.map((i) => i + shift)],
    }));

    this.add(entries);
    this.logger.debug('Router mounted', { prefix: head.source, routes: entries.length, strip });
    return this;
  }

  /**
   * Register routes under a shared prefix and middleware. The group's
   * handlers see the full path.
   *
   *   router.group('/admin', (admin) => {
   *     admin.use(requireAdmin);
   *     admin.get('/stats', stats);
   *   });
   */
  group(prefix: string, build: (group: Router) => void): this {
    const group = new Router(this.settings);
    build(group);
    return this.mount(prefix, group, { strip: false });
  }

  /**
   * Replace the endpoint answering requests no route matches
   */
  fallback(handler: EndpointLike): this {
    this.assertOpen('fallback');
    this.fallbackEndpoint = toEndpoint(handler);
    return this;
  }

  /**
   * Close the router for registration and build the dispatch chain
   */
  freeze(): this {
    this.chain();
    return this;
  }

  /**
   * Find the endpoint for a method and path
   */
  resolve(method: string, path: string): Resolution {
    this.freeze();

    const raw = splitPath(path);
    const policy = this.trie.regexPrecedence;
    const allowed = new Set<HttpMethod>();
    let best: { entry: RouteEntry; endpoint: Endpoint; values: readonly string[] } | undefined;

    for (const candidate of this.trie.collect(raw)) {
      for (const entry of candidate.entries) {
        const endpoint = entry.methods.get(method);
        if (!endpoint) {
          entry.methods.allowed().forEach((m) => allowed.add(m));
          continue;
        }
        if (
          !best ||
          compareSpecificity(entry.pattern.specificity, best.entry.pattern.specificity, policy) > 0
        ) {
          best = { entry, endpoint, values: candidate.values };
        }
      }
    }

    if (best) {
      return {
        kind: 'resolved',
        endpoint: best.endpoint,
        params: PathParams.fromCaptures(best.entry.pattern.captureNames, best.values),
        route: best.entry,
        path: handlerPath(path, raw, best.entry.strip),
      };
    }

    if (allowed.size > 0) {
      return { kind: 'method-not-allowed', allowed: HTTP_METHODS.filter((m) => allowed.has(m)) };
    }

    return { kind: 'not-found' };
  }

  async call(req: JunctionRequest): Promise<Response> {
    return await this.chain().call(req);
  }

  /**
   * Generate a URL for a named route
   */
  url(name: string, params: Record<string, string> = {}): string | null {
    const route = this.namedRoutes.get(name);
    if (!route) return null;
    return buildPath(route.pattern, params);
  }

  /**
   * Get all registered routes, in registration order
   */
  routes(): readonly RouteEntry[] {
    return this.trie.entries();
  }

  private chain(): Endpoint {
    if (this.dispatcher) return this.dispatcher;

    const dispatcher = this.pipeline.transform(toEndpoint((req) => this.dispatch(req)));
    this.dispatcher = dispatcher;
    this.logger.debug('Router frozen', {
      routes: this.trie.size,
      middleware: this.pipeline.length,
    });
    return dispatcher;
  }

  private async dispatch(req: JunctionRequest): Promise<Response> {
    const resolution = this.resolve(req.method, req.path);

    switch (resolution.kind) {
      case 'resolved': {
        const source = resolution.route.pattern.source;
        req.state.set(MATCHED_ROUTE, source);
        setRouteAttribute(source, req.method);
        return await resolution.endpoint.call(
          req.withRoute(resolution.params, resolution.path, source),
        );
      }
      case 'method-not-allowed':
        return new JunctionResponse().methodNotAllowed(resolution.allowed);
      case 'not-found':
        return await this.fallbackEndpoint.call(req);
    }
  }

  /**
   * Validate a batch of entries, then insert all of them. Nothing is
   * inserted when any entry is rejected.
   */
  private add(batch: Omit<RouteEntry, 'order'>[]): void {
    const entries: RouteEntry[] = batch.map((entry, i) => ({ ...entry, order: this.nextOrder + i }));
    const names = new Set<string>();

    for (const entry of entries) {
      if (entry.name === undefined) continue;
      if (this.namedRoutes.has(entry.name) || names.has(entry.name)) {
        throw new RegistrationError(entry.pattern.source, `route name "${entry.name}" is already used`);
      }
      names.add(entry.name);
    }

    this.trie.check(entries);

    for (const entry of entries) {
      this.trie.insert(entry);
      if (entry.name !== undefined) {
        this.namedRoutes.set(entry.name, entry);
      }
      this.logger.debug('Route registered', {
        methods: entry.methods.selectors().join(', '),
        pattern: entry.pattern.source,
        name: entry.name,
      });
    }
    this.nextOrder += entries.length;
  }

  private wrap(ep: Endpoint, options: RouteOptions): Endpoint {
    const middleware = options.middleware ?? [];
    if (middleware.length === 0) return ep;
    return compose(...middleware.map(toMiddleware)).transform(ep);
  }

  private join(prefix: Pattern, child: Pattern): Pattern {
    try {
      return joinPatterns(prefix, child);
    } catch (error) {
      if (error instanceof CompileError) {
        throw new RegistrationError(error.pattern, error.reason);
      }
      throw error;
    }
  }

  private settingsDiffer(child: Router): string[] {
    const differing: string[] = [];
    if (child.trie.ignoreCase !== this.trie.ignoreCase) differing.push('ignoreCase');
    if (child.trie.regexPrecedence !== this.trie.regexPrecedence) differing.push('regexPrecedence');
    return differing;
  }

  private assertOpen(target: string, method?: string): void {
    if (this.dispatcher) {
      throw new RegistrationError(target, 'router is frozen', method);
    }
  }
}

function isSelector(value: string): value is MethodSelector {
  return value === '*' || isHttpMethod(value);
}

/**
 * Path seen by a handler: the request path minus stripped mount segments.
 * A trailing slash is kept.
 */
function handlerPath(path: string, raw: readonly string[], strip: readonly number[]): string {
  const query = path.indexOf('?');
  const pathname = query === -1 ? path : path.slice(0, query);
  if (strip.length === 0) return pathname;

  const hidden = new Set(strip);
  const rest = raw.filter((_, i) => !hidden.has(i));
  const trailing = rest.length > 0 && pathname.endsWith('/') ? '/' : '';
  return '/' + rest.join('/') + trailing;
}
