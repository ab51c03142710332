/**
 * Registry Tests
 */

import assert from 'node:assert/strict';
import { test } from 'node:test';
import { ConfigurationError } from '../../framework/errors.ts';
import type { HttpMethod } from '../../framework/http/types.ts';
import {
  pathMatches,
  type ErrorHandlerEntry,
  type InterceptorEntry,
  type ParameterSpec,
  type PathPattern,
  type RouteEntry,
} from '../../framework/registry/entries.ts';
import { Registry } from '../../framework/registry/registry.ts';
import { compileTemplate } from '../../framework/router/template.ts';

const noop = () => null;

function routeEntry(
  method: HttpMethod,
  path: string,
  name = `${method} ${path}`,
  params: ParameterSpec[] = []
): RouteEntry {
  return {
    kind: 'route',
    name,
    method,
    template: compileTemplate(path),
    handler: noop,
    params,
    annotations: [],
    statusCode: 200,
  };
}

function interceptorEntry(name: string, pattern: PathPattern, group: number): InterceptorEntry {
  return { kind: 'interceptor', name, pattern, group, handler: noop, params: [], annotations: [] };
}

function errorEntry(statusCode: number | 'default', params: ParameterSpec[] = []): ErrorHandlerEntry {
  return {
    kind: 'error',
    name: `error:${statusCode}`,
    statusCode,
    handler: noop,
    params,
    annotations: [],
  };
}

test('pathMatches - prefixes match at segment boundaries', () => {
  assert.equal(pathMatches('/api', '/api'), true);
  assert.equal(pathMatches('/api', '/api/users'), true);
  assert.equal(pathMatches('/api/*', '/api/users'), true);
  assert.equal(pathMatches('/api/', '/api'), true);
  assert.equal(pathMatches('/api', '/apis'), false);
  assert.equal(pathMatches('/', '/anything'), true);
  assert.equal(pathMatches('/*', '/'), true);
});

test('pathMatches - regular expressions', () => {
  const pattern = /^\/v\d+\//g;
  assert.equal(pathMatches(pattern, '/v1/users'), true);
  assert.equal(pathMatches(pattern, '/v2/users'), true);
  assert.equal(pathMatches(pattern, '/users'), false);
});

test('Registry - register and match routes', () => {
  const registry = new Registry();
  registry.register(routeEntry('GET', '/users/:id', 'getUser'));

  const match = registry.match('GET', '/users/9');
  assert.equal(match?.route.name, 'getUser');
  assert.deepEqual(match?.params, { id: '9' });
  assert.deepEqual(registry.allowedMethods('/users/9'), ['GET']);
});

test('Registry - duplicate route name for the same method is rejected', () => {
  const registry = new Registry();
  registry.register(routeEntry('GET', '/a', 'handler'));

  assert.throws(() => registry.register(routeEntry('GET', '/b', 'handler')), ConfigurationError);
  // Same name on another method is fine
  registry.register(routeEntry('POST', '/a', 'handler'));
  assert.equal(registry.routes().length, 2);
});

test('Registry - interceptors are ordered by group then registration', () => {
  const registry = new Registry();
  registry.register(interceptorEntry('late', '/', 10));
  registry.register(interceptorEntry('first', '/', 1));
  registry.register(interceptorEntry('second', '/api', 1));
  registry.register(interceptorEntry('early', '/', -5));

  assert.deepEqual(
    registry.interceptorsFor('/api/x').map((entry) => entry.name),
    ['early', 'first', 'second', 'late']
  );
  assert.deepEqual(
    registry.interceptorsFor('/other').map((entry) => entry.name),
    ['early', 'first', 'late']
  );
  assert.equal(registry.interceptorCount, 4);
});

test('Registry - error handler lookup falls back to the default handler', () => {
  const registry = new Registry();
  const notFound = errorEntry(404);
  const fallback = errorEntry('default');
  registry.register(notFound);

  assert.equal(registry.errorHandlerFor(404), notFound);
  assert.equal(registry.errorHandlerFor(500), undefined);

  registry.register(fallback);
  assert.equal(registry.errorHandlerFor(500), fallback);
});

test('Registry - duplicate error handlers are rejected', () => {
  const registry = new Registry();
  registry.register(errorEntry(404));
  registry.register(errorEntry('default'));

  assert.throws(() => registry.register(errorEntry(404)), ConfigurationError);
  assert.throws(() => registry.register(errorEntry('default')), ConfigurationError);
});

test('Registry - duplicate provider markers are rejected', () => {
  const registry = new Registry();
  registry.addProvider('tenant', () => 'acme');

  assert.throws(() => registry.addProvider('tenant', () => 'other'), ConfigurationError);
  assert.throws(() => registry.addProvider('empty', () => 1, []), ConfigurationError);
});

test('Registry - seal validates parameter markers', () => {
  const registry = new Registry();
  registry.register(routeEntry('GET', '/a', 'a', [{ name: 'x', marker: 'missing' }]));

  assert.throws(() => registry.seal(), /No parameter provider for marker "missing"/);
  assert.equal(registry.isSealed, false);
});

test('Registry - seal checks the kinds a marker is allowed on', () => {
  const registry = new Registry();
  registry.addProvider('routeOnly', () => 1, ['route']);
  registry.register(errorEntry(500, [{ name: 'x', marker: 'routeOnly' }]));

  assert.throws(() => registry.seal(), /not allowed on error handlers/);
});

test('Registry - registration after seal is rejected', () => {
  const registry = new Registry();
  registry.seal();

  assert.equal(registry.isSealed, true);
  assert.throws(() => registry.register(routeEntry('GET', '/late')), /registry is sealed/);
  assert.throws(() => registry.addProvider('late', () => 1), ConfigurationError);
  assert.throws(() => registry.addProcessor((_m, _h, value) => value), ConfigurationError);
});

test('Registry - processors apply globally or by annotation', () => {
  const registry = new Registry();
  const global = (_m: unknown, _h: string, value: unknown) => value;
  const wrap = (_m: unknown, _h: string, value: unknown) => ({ data: value });
  registry.addProcessor(global);
  registry.addProcessor(wrap, 'envelope');

  const plain = routeEntry('GET', '/plain');
  const annotated: RouteEntry = {
    ...routeEntry('GET', '/wrapped'),
    annotations: [{ marker: 'envelope', metadata: { version: 2 } }],
  };

  assert.deepEqual(registry.processorsFor(plain), [{ processor: global, metadata: undefined }]);
  assert.deepEqual(registry.processorsFor(annotated), [
    { processor: global, metadata: undefined },
    { processor: wrap, metadata: { version: 2 } },
  ]);
});

test('Registry - clear reopens the registry', () => {
  const registry = new Registry();
  registry.register(routeEntry('GET', '/a'));
  registry.addProvider('x', () => 1);
  registry.seal();

  registry.clear();

  assert.equal(registry.isSealed, false);
  assert.equal(registry.routes().length, 0);
  assert.equal(registry.provider('x'), undefined);
  registry.register(routeEntry('GET', '/a'));
});
