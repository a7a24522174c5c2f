/**
 * Scheme Router Tests
 */

import assert from 'node:assert/strict';
import { test } from 'node:test';
import { JunctionRequest } from '../../framework/http/request.ts';
import type { Handler } from '../../framework/http/types.ts';
import { SchemeRouter } from '../../framework/router/scheme.ts';

const reply = (body: string): Handler => () => new Response(body);

async function send(router: SchemeRouter, url: string): Promise<[number, string]> {
  const res = await router.call(JunctionRequest.from(url));
  return [res.status, await res.text()];
}

test('SchemeRouter - picks the endpoint for the scheme', async () => {
  const router = new SchemeRouter().https(reply('secure')).http(reply('plain'));

  assert.deepEqual(await send(router, 'https://example.test/'), [200, 'secure']);
  assert.deepEqual(await send(router, 'http://example.test/'), [200, 'plain']);
});

test('SchemeRouter - unknown schemes use the fallback or 404', async () => {
  const bare = new SchemeRouter().https(reply('secure'));
  const upgrading = new SchemeRouter()
    .https(reply('secure'))
    .fallback((req) => new Response(null, {
      status: 308,
      headers: { Location: req.url.replace(/^http:/, 'https:') },
    }));

  assert.deepEqual(await send(bare, 'http://example.test/'), [404, '{"error":"Not Found"}']);

  const res = await upgrading.call(JunctionRequest.from('http://example.test/cart?id=1'));
  assert.equal(res.status, 308);
  assert.equal(res.headers.get('Location'), 'https://example.test/cart?id=1');
});

test('SchemeRouter - custom schemes compare case-insensitively', () => {
  const router = new SchemeRouter().custom('WSS', reply('socket'));

  assert.ok(router.resolve('wss'));
  assert.equal(router.resolve('ws'), undefined);
});

test('SchemeRouter - rejects a scheme registered twice', () => {
  assert.throws(() => new SchemeRouter().http(reply('a')).custom('HTTP', reply('b')), {
    name: 'RegistrationError',
    message: 'Cannot register "http": scheme is already registered',
  });
});
