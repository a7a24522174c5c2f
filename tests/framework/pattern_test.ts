/**
 * Pattern Compiler Tests
 */

import assert from 'node:assert/strict';
import { test } from 'node:test';
import { CompileError } from '../../framework/http/errors.ts';
import { buildPath, compile, joinPatterns } from '../../framework/router/pattern.ts';

test('compile - classifies each segment kind', () => {
  const pattern = compile('/files/:owner/<\\d+>/:id<[a-z]+>/*rest');

  assert.deepEqual(
    pattern.segments.map((s) => s.kind),
    ['literal', 'capture', 'regex', 'regex', 'wildcard'],
  );
  assert.deepEqual(pattern.captureNames, ['owner', undefined, 'id', 'rest']);
  assert.equal(pattern.hasWildcard, true);
});

test('compile - bare capture and wildcard are unnamed', () => {
  const pattern = compile('/a/:/*');

  assert.deepEqual(pattern.captureNames, [undefined, undefined]);
  assert.deepEqual(pattern.segments[1], { kind: 'capture', name: undefined });
});

test('compile - counts specificity', () => {
  const pattern = compile('/users/:id/posts/<\\d+>/*rest');

  assert.deepEqual(pattern.specificity, {
    literals: 2,
    regexes: 1,
    captures: 1,
    wildcard: true,
  });
});

test('compile - skips empty pieces and adds a leading slash', () => {
  const pattern = compile('users//:id/');

  assert.equal(pattern.source, '/users//:id/');
  assert.equal(pattern.segments.length, 2);
  assert.equal(compile('users/:id').source, '/users/:id');
});

test('compile - root pattern has no segments', () => {
  const pattern = compile('/');

  assert.equal(pattern.segments.length, 0);
  assert.equal(pattern.shapeKey, '/');
});

test('compile - shape ignores capture names', () => {
  assert.equal(compile('/users/:id').shapeKey, compile('/users/:name').shapeKey);
  assert.equal(compile('/users/:id').shapeKey, '/Lusers/:');
  assert.notEqual(compile('/users/:id').shapeKey, compile('/users/:id<\\d+>').shapeKey);
  assert.notEqual(compile('/users/:id').shapeKey, compile('/users/*id').shapeKey);
});

test('compile - regex is anchored', () => {
  const pattern = compile('/item/:id<\\d+>');
  const segment = pattern.segments[1];

  assert.equal(segment.kind, 'regex');
  if (segment.kind === 'regex') {
    assert.equal(segment.regex.test('123'), true);
    assert.equal(segment.regex.test('123abc'), false);
    assert.equal(segment.source, '\\d+');
  }
});

test('compile - pattern is frozen', () => {
  const pattern = compile('/users/:id');

  assert.equal(Object.isFrozen(pattern), true);
  assert.equal(Object.isFrozen(pattern.segments), true);
});

test('compile - rejects an empty pattern', () => {
  assert.throws(() => compile(''), CompileError);
});

test('compile - rejects duplicate capture names', () => {
  assert.throws(
    () => compile('/a/:id/b/:id'),
    { name: 'CompileError', message: 'Invalid route pattern "/a/:id/b/:id": duplicate capture name "id"' },
  );
});

test('compile - rejects a wildcard that is not last', () => {
  assert.throws(
    () => compile('/files/*rest/more'),
    { message: 'Invalid route pattern "/files/*rest/more": a wildcard must be the last segment' },
  );
});

test('compile - rejects an invalid regex', () => {
  assert.throws(() => compile('/item/:id<[>'), CompileError);
});

test('compile - rejects an unterminated regex', () => {
  assert.throws(
    () => compile('/item/:id<\\d+'),
    { message: 'Invalid route pattern "/item/:id<\\d+": unterminated regex in segment "<\\d+"' },
  );
});

test('compile - rejects an empty regex', () => {
  assert.throws(() => compile('/item/:id<>'), { reason: 'empty regex' });
});

test('compile - rejects an invalid capture name', () => {
  assert.throws(() => compile('/item/:1st'), { reason: 'invalid capture name "1st"' });
  assert.throws(() => compile('/item/*a-b'), CompileError);
});

test('joinPatterns - concatenates prefix and child', () => {
  const joined = joinPatterns(compile('/api/:version'), compile('/users/:id'));

  assert.equal(joined.source, '/api/:version/users/:id');
  assert.deepEqual(joined.captureNames, ['version', 'id']);
  assert.equal(joined.specificity.literals, 2);
});

test('joinPatterns - handles root on either side', () => {
  assert.equal(joinPatterns(compile('/'), compile('/x')).source, '/x');
  assert.equal(joinPatterns(compile('/api/'), compile('/')).source, '/api');
  assert.equal(joinPatterns(compile('/'), compile('/')).source, '/');
});

test('joinPatterns - rejects duplicate names across prefix and child', () => {
  assert.throws(() => joinPatterns(compile('/u/:id'), compile('/:id')), CompileError);
});

test('buildPath - encodes capture values', () => {
  assert.equal(buildPath(compile('/users/:id'), { id: 'a b' }), '/users/a%20b');
  assert.equal(buildPath(compile('/users/:id'), { id: 'a/b' }), '/users/a%2Fb');
});

test('buildPath - wildcard keeps its slashes', () => {
  assert.equal(buildPath(compile('/files/*rest'), { rest: 'a/b c' }), '/files/a/b%20c');
  assert.equal(buildPath(compile('/files/*rest'), { rest: '' }), '/files');
});

test('buildPath - rejects missing and mismatching values', () => {
  assert.throws(() => buildPath(compile('/users/:id'), {}), {
    message: 'Missing parameter "id" for "/users/:id"',
  });
  assert.throws(() => buildPath(compile('/item/:id<\\d+>'), { id: 'abc' }), {
    message: 'Parameter "id" does not match <\\d+>',
  });
  assert.throws(() => buildPath(compile('/item/:'), {}), Error);
});
