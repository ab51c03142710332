/**
 * Middleware Pipeline Tests
 */

import assert from 'node:assert/strict';
import { test } from 'node:test';
import { DispatchRequest } from '../../framework/http/request.ts';
import type { Middleware } from '../../framework/http/types.ts';
import { forMethods, forPath, MiddlewarePipeline } from '../../framework/middleware/mod.ts';
import { Logger, setLogger } from '../../framework/telemetry/logger.ts';

setLogger(new Logger({ output: () => {} }));

function dispatchRequest(path: string, method = 'GET'): DispatchRequest {
  return new DispatchRequest(new Request(`http://localhost${path}`, { method }));
}

function recorder(trace: string[], name: string): Middleware {
  return async (_request, next) => {
    trace.push(`${name} in`);
    const response = await next();
    trace.push(`${name} out`);
    return response;
  };
}

test('MiddlewarePipeline - onion order', async () => {
  const trace: string[] = [];
  const pipeline = new MiddlewarePipeline().use(recorder(trace, 'a')).use(recorder(trace, 'b'));

  const response = await pipeline.execute(dispatchRequest('/'), async () => {
    trace.push('final');
    return new Response('done');
  });

  assert.equal(await response.text(), 'done');
  assert.deepEqual(trace, ['a in', 'b in', 'final', 'b out', 'a out']);
});

test('MiddlewarePipeline - short-circuit skips the rest', async () => {
  let reached = false;
  const pipeline = new MiddlewarePipeline().use(() => new Response('stop', { status: 403 }));

  const response = await pipeline.execute(dispatchRequest('/'), async () => {
    reached = true;
    return new Response('done');
  });

  assert.equal(response.status, 403);
  assert.equal(reached, false);
});

test('MiddlewarePipeline - next() twice rejects', async () => {
  const pipeline = new MiddlewarePipeline().use(async function twice(_request, next) {
    await next();
    return await next();
  });

  await assert.rejects(
    pipeline.execute(dispatchRequest('/'), async () => new Response('done')),
    /next\(\) called twice by twice/
  );
});

test('MiddlewarePipeline - remove and clear', () => {
  const trace: string[] = [];
  const first = recorder(trace, 'first');
  const pipeline = new MiddlewarePipeline().use(first).use(recorder(trace, 'second'));

  pipeline.remove(first);
  assert.equal(pipeline.length, 1);
  pipeline.clear();
  assert.equal(pipeline.length, 0);
});

test('forPath and forMethods - conditional middleware', async () => {
  const trace: string[] = [];
  const pipeline = new MiddlewarePipeline()
    .use(forPath('/api', recorder(trace, 'api')))
    .use(forMethods(['post'], recorder(trace, 'post')));
  const final = async () => new Response('ok');

  await pipeline.execute(dispatchRequest('/api/x'), final);
  await pipeline.execute(dispatchRequest('/web', 'POST'), final);

  assert.deepEqual(trace, ['api in', 'api out', 'post in', 'post out']);
});
