/**
 * Middleware Tests
 */

import assert from 'node:assert/strict';
import { test } from 'node:test';
import { SpanKind, SpanStatusCode } from '@opentelemetry/api';
import { endpoint } from '../../framework/endpoint/endpoint.ts';
import { JunctionRequest } from '../../framework/http/request.ts';
import { withHeaders } from '../../framework/http/response.ts';
import type { Middleware, MiddlewareFn } from '../../framework/http/types.ts';
import { addData } from '../../framework/middleware/add_data.ts';
import { after, around, before, compose } from '../../framework/middleware/compose.ts';
import { cors } from '../../framework/middleware/cors.ts';
import { levelForStatus, logging } from '../../framework/middleware/logging.ts';
import {
  conditional,
  forMethods,
  forPath,
  MiddlewarePipeline,
} from '../../framework/middleware/pipeline.ts';
import { setHeader } from '../../framework/middleware/set_header.ts';
import { stripPrefix } from '../../framework/middleware/strip_prefix.ts';
import { tracing } from '../../framework/middleware/tracing.ts';
import { Router } from '../../framework/router/router.ts';
import { type LogEntry, Logger, setLogger } from '../../framework/telemetry/logger.ts';
import { RecordingSpan, recordingTracer } from './recording_span.ts';

setLogger(new Logger({ output: () => {} }));

const ok = endpoint(() => new Response('ok'));

function recorder(name: string, log: string[]): Middleware {
  return around(async (_req, next) => {
    log.push(`${name}-before`);
    const res = await next();
    log.push(`${name}-after`);
    return res;
  });
}

function tag(name: string): Middleware {
  return after((res) => withHeaders(res, (h) => h.set(name, '1')));
}

// ============================================================================
// Pipeline
// ============================================================================

test('MiddlewarePipeline - executes middleware in order', async () => {
  const pipeline = new MiddlewarePipeline();
  const order: number[] = [];

  pipeline.use(async (_req, next) => {
    order.push(1);
    const response = await next();
    order.push(4);
    return response;
  });

  pipeline.use(async (_req, next) => {
    order.push(2);
    const response = await next();
    order.push(3);
    return response;
  });

  await pipeline.execute(JunctionRequest.from('/test'), ok);

  assert.deepEqual(order, [1, 2, 3, 4]);
});

test('MiddlewarePipeline - can short-circuit', async () => {
  const pipeline = new MiddlewarePipeline();
  let reached = false;

  pipeline.use(() => new Response('Blocked', { status: 403 }));

  const response = await pipeline.execute(
    JunctionRequest.from('/test'),
    endpoint(() => {
      reached = true;
      return new Response('ok');
    }),
  );

  assert.equal(response.status, 403);
  assert.equal(reached, false);
});

test('MiddlewarePipeline - useAt, remove and clear', async () => {
  const log: string[] = [];
  const first = recorder('first', log);
  const pipeline = new MiddlewarePipeline().use(first).use(recorder('last', log));

  pipeline.useAt(0, recorder('zero', log));
  assert.equal(pipeline.length, 3);

  pipeline.remove(first);
  assert.equal(pipeline.length, 2);

  await pipeline.execute(JunctionRequest.from('/'), ok);
  assert.deepEqual(log, ['zero-before', 'last-before', 'last-after', 'zero-after']);

  pipeline.clear();
  assert.equal(pipeline.length, 0);
  assert.equal(pipeline.transform(ok), ok);
});

test('compose - first middleware is outermost', async () => {
  const log: string[] = [];
  const ep = compose(recorder('A', log), recorder('B', log)).transform(ok);

  await ep.call(JunctionRequest.from('/'));

  assert.deepEqual(log, ['A-before', 'B-before', 'B-after', 'A-after']);
});

test('before/after - build request-only and response-only middleware', async () => {
  const ep = compose(
    before((req) => req.withPath('/changed')),
    tag('X-After'),
  ).transform(endpoint((req) => new Response(req.path)));

  const res = await ep.call(JunctionRequest.from('/original'));
  assert.equal(await res.text(), '/changed');
  assert.equal(res.headers.get('X-After'), '1');
});

test('conditional - runs middleware only when the condition holds', async () => {
  const ep = conditional((req) => req.query.has('tag'), tag('X-Tagged')).transform(ok);

  const tagged = await ep.call(JunctionRequest.from('/?tag=1'));
  const plain = await ep.call(JunctionRequest.from('/'));
  assert.equal(tagged.headers.get('X-Tagged'), '1');
  assert.equal(plain.headers.get('X-Tagged'), null);
});

test('forPath - matches the handler path prefix', async () => {
  const ep = forPath('/api', tag('X-Api')).transform(ok);

  assert.equal((await ep.call(JunctionRequest.from('/api/users'))).headers.get('X-Api'), '1');
  assert.equal((await ep.call(JunctionRequest.from('/web'))).headers.get('X-Api'), null);
});

test('forMethods - matches methods case-insensitively', async () => {
  const block: MiddlewareFn = () => new Response('read only', { status: 405 });
  const ep = forMethods(['post', 'put'], block).transform(ok);

  assert.equal((await ep.call(JunctionRequest.from('/', { method: 'POST' }))).status, 405);
  assert.equal((await ep.call(JunctionRequest.from('/'))).status, 200);
});

// ============================================================================
// Supplied middleware
// ============================================================================

test('setHeader - overrides and appends', async () => {
  const ep = endpoint(() => new Response('x', { headers: { 'X-A': '1', 'Cache-Control': 'private' } }))
    .with(setHeader().overriding('X-A', '2').appending('Cache-Control', 'no-store').appending('X-New', 'n'));

  const res = await ep.call(JunctionRequest.from('/'));
  assert.equal(res.headers.get('X-A'), '2');
  assert.equal(res.headers.get('Cache-Control'), 'private, no-store');
  assert.equal(res.headers.get('X-New'), 'n');
});

test('stripPrefix - removes the prefix from the handler path', async () => {
  const ep = endpoint((req) => new Response(req.path)).with(stripPrefix('/api/'));

  assert.equal(await (await ep.call(JunctionRequest.from('/api/hello'))).text(), '/hello');
  assert.equal(await (await ep.call(JunctionRequest.from('/api'))).text(), '/');
  assert.equal((await ep.call(JunctionRequest.from('/apix'))).status, 404);
  assert.equal((await ep.call(JunctionRequest.from('/other/hello'))).status, 404);
});

test('stripPrefix - routes a nested router by the stripped path', async () => {
  const inner = new Router().get('/hello', (req) => new Response(`${req.path} ${req.originalPath}`));
  const ep = inner.with(stripPrefix('/v1'));

  assert.equal(await (await ep.call(JunctionRequest.from('/v1/hello'))).text(), '/hello /v1/hello');
});

test('addData - puts a value into request state', async () => {
  const ep = endpoint((req) => new Response(String(req.state.get('db')))).with(addData('db', 'test-db'));

  assert.equal(await (await ep.call(JunctionRequest.from('/'))).text(), 'test-db');
});

test('addData - state is visible to routed handlers', async () => {
  const router = new Router()
    .use(addData('user', 'ada'))
    .get('/me', (req) => new Response(String(req.state.get('user'))));

  assert.equal(await (await router.call(JunctionRequest.from('/me'))).text(), 'ada');
});

test('cors - answers preflight requests', async () => {
  let reached = false;
  const ep = endpoint(() => {
    reached = true;
    return new Response('x');
  }).with(cors());

  const res = await ep.call(JunctionRequest.from('/items', {
    method: 'OPTIONS',
    headers: { Origin: 'https://app.test', 'Access-Control-Request-Method': 'POST' },
  }));

  assert.equal(res.status, 204);
  assert.equal(reached, false);
  assert.equal(res.headers.get('Access-Control-Allow-Origin'), '*');
  assert.equal(res.headers.get('Access-Control-Allow-Methods'), 'GET, HEAD, PUT, PATCH, POST, DELETE');
  assert.equal(res.headers.get('Access-Control-Allow-Headers'), 'Content-Type, Authorization');
  assert.equal(res.headers.get('Access-Control-Max-Age'), '86400');
  assert.equal(res.headers.get('Vary'), null);
});

test('cors - reflects allowed origins on responses', async () => {
  const ep = ok.with(cors({
    origin: ['https://app.test'],
    credentials: true,
    exposedHeaders: ['X-Total'],
  }));

  const allowed = await ep.call(JunctionRequest.from('/', { headers: { Origin: 'https://app.test' } }));
  assert.equal(allowed.headers.get('Access-Control-Allow-Origin'), 'https://app.test');
  assert.equal(allowed.headers.get('Access-Control-Allow-Credentials'), 'true');
  assert.equal(allowed.headers.get('Access-Control-Expose-Headers'), 'X-Total');
  assert.equal(allowed.headers.get('Vary'), 'Origin');

  const denied = await ep.call(JunctionRequest.from('/', { headers: { Origin: 'https://evil.test' } }));
  assert.equal(denied.headers.get('Access-Control-Allow-Origin'), null);
  assert.equal(denied.headers.get('Access-Control-Expose-Headers'), null);
});

test('cors - adds headers to 404 and 405 responses', async () => {
  const router = new Router().use(cors()).get('/items', () => new Response('items'));
  const headers = { Origin: 'https://app.test' };

  const missing = await router.call(JunctionRequest.from('/missing', { headers }));
  const wrong = await router.call(JunctionRequest.from('/items', { method: 'DELETE', headers }));

  assert.equal(missing.status, 404);
  assert.equal(missing.headers.get('Access-Control-Allow-Origin'), '*');
  assert.equal(wrong.status, 405);
  assert.equal(wrong.headers.get('Access-Control-Allow-Origin'), '*');
});

test('logging - logs responses with status-based levels', async () => {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level: 'debug', output: (entry) => entries.push(entry) });
  const router = new Router()
    .use(logging({ logger }))
    .get('/ok/:id', () => new Response('ok'))
    .get('/boom', () => new Response('no', { status: 503 }));

  await router.call(JunctionRequest.from('/ok/1', { headers: { 'X-Request-Id': 'req-1' } }));
  await router.call(JunctionRequest.from('/missing'));
  await router.call(JunctionRequest.from('/boom'));

  assert.deepEqual(
    entries.map((e) => [e.level, e.message]),
    [
      ['info', '← GET /ok/1 200'],
      ['warn', '← GET /missing 404'],
      ['error', '← GET /boom 503'],
    ],
  );
  assert.equal(entries[0].context?.requestId, 'req-1');
  assert.equal(entries[0].context?.route, '/ok/:id');
  assert.equal(entries[0].context?.status, 200);
  assert.equal(typeof entries[0].context?.duration, 'number');
  assert.equal(entries[1].context?.route, undefined);
});

test('logging - request lines and excluded paths', async () => {
  const entries: LogEntry[] = [];
  const logger = new Logger({ output: (entry) => entries.push(entry) });
  const ep = ok.with(logging({ logger, logRequest: true, excludePaths: ['/health'] }));

  await ep.call(JunctionRequest.from('/health/live'));
  await ep.call(JunctionRequest.from('/work', { method: 'POST' }));

  assert.deepEqual(entries.map((e) => e.message), ['→ POST /work', '← POST /work 200']);
});

test('levelForStatus - maps status classes to levels', () => {
  assert.equal(levelForStatus(204), 'info');
  assert.equal(levelForStatus(302), 'info');
  assert.equal(levelForStatus(404), 'warn');
  assert.equal(levelForStatus(500), 'error');
});

// ============================================================================
// Tracing
// ============================================================================

test('tracing - records a server span per request', async () => {
  const spans: RecordingSpan[] = [];
  const router = new Router()
    .use(tracing({ tracer: recordingTracer(spans) }))
    .get('/users/:id', () => new Response('user'));

  await router.call(JunctionRequest.from('/users/7'));

  assert.equal(spans.length, 1);
  const [span] = spans;
  assert.equal(span.name, 'GET /users/:id');
  assert.equal(span.options.kind, SpanKind.SERVER);
  assert.deepEqual(span.attributes, {
    'http.request.method': 'GET',
    'url.path': '/users/7',
    'url.scheme': 'http',
    'http.route': '/users/:id',
    'http.response.status_code': 200,
  });
  assert.equal(span.status.code, SpanStatusCode.UNSET);
  assert.equal(span.ended, true);
});

test('tracing - marks server errors and unmatched requests', async () => {
  const spans: RecordingSpan[] = [];
  const router = new Router()
    .use(tracing({ tracer: recordingTracer(spans) }))
    .get('/fail', () => {
      throw new Error('broken');
    });

  await router.call(JunctionRequest.from('/fail'));
  await router.call(JunctionRequest.from('/nowhere'));

  assert.equal(spans[0].status.code, SpanStatusCode.ERROR);
  assert.equal(spans[0].attributes['http.response.status_code'], 500);
  assert.equal(spans[1].name, 'GET');
  assert.equal(spans[1].attributes['http.route'], undefined);
  assert.equal(spans[1].attributes['http.response.status_code'], 404);
  assert.equal(spans[1].status.code, SpanStatusCode.UNSET);
});
