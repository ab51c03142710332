/**
 * Application Tests
 *
 * End-to-end dispatches through the application, without a network.
 */

import assert from 'node:assert/strict';
import { Buffer } from 'node:buffer';
import { test } from 'node:test';
import { setTimeout as delay } from 'node:timers/promises';
import { Application } from '../../framework/app.ts';
import { authenticateBasic } from '../../framework/auth/basic.ts';
import { chain, redirect, request } from '../../framework/chain/context.ts';
import { ConfigurationError, ContextError, ErrorResponse, ExpectedAbort } from '../../framework/errors.ts';
import { definePlugin } from '../../framework/plugin/plugin.ts';
import type { Handler } from '../../framework/registry/entries.ts';
import { Logger, setLogger } from '../../framework/telemetry/logger.ts';

function createTestApp(appName?: string): Application {
  return new Application({
    config: appName ? { appName } : {},
    logger: new Logger({ output: () => {} }),
  });
}

function get(app: Application, path: string, headers?: Record<string, string>): Promise<Response> {
  return app.dispatch(new Request(`http://localhost${path}`, { headers }));
}

function tracer(trace: string[], name: string): Handler {
  return async (_params, { chain }) => {
    trace.push(`${name} before`);
    await chain.next();
    trace.push(`${name} after`);
  };
}

test('Application - mapping values round-trip as JSON', async () => {
  const app = createTestApp().get('/data', () => ({ a: 1, b: [2, 3] }));
  await app.setUp();

  const response = await get(app, '/data');

  assert.equal(response.status, 200);
  assert.equal(response.headers.get('content-type'), 'application/json');
  assert.deepEqual(await response.json(), { a: 1, b: [2, 3] });
});

test('Application - null yields an empty 200 response', async () => {
  const app = createTestApp().get('/nothing', () => null);
  await app.setUp();

  const response = await get(app, '/nothing');

  assert.equal(response.status, 200);
  assert.equal(await response.text(), '');
});

test('Application - a failing provider yields a 400 naming the handler and parameter', async () => {
  const app = createTestApp();
  app.addParameterProvider('user', () => {
    throw new Error('no such user');
  });
  app.get('/users/:id', ({ id }) => ({ id }), {
    name: 'getUser',
    params: [{ name: 'id', marker: 'user' }],
  });
  await app.setUp();

  const response = await get(app, '/users/7');

  assert.equal(response.status, 400);
  assert.equal(
    await response.text(),
    'Failed to resolve parameter "id" of handler "getUser": no such user'
  );
});

test('Application - fresh registry answers 404 with the built-in page', async () => {
  const app = createTestApp();
  await app.setUp();

  const response = await get(app, '/missing/page');

  assert.equal(response.status, 404);
  const body = await response.text();
  assert.ok(body.includes('404'));
  assert.ok(body.includes('/missing/page'));
});

test('Application - wrong method answers 405 with an Allow header', async () => {
  const app = createTestApp().get('/items', () => []).post('/items', () => null);
  await app.setUp();

  const response = await app.dispatch(
    new Request('http://localhost/items', { method: 'DELETE' })
  );

  assert.equal(response.status, 405);
  assert.equal(response.headers.get('allow'), 'GET, POST');
  assert.match(await response.text(), /405 - METHOD NOT ALLOWED/);
});

test('Application - the configured name appears on the error page', async () => {
  const app = createTestApp('Demo');
  await app.setUp();

  const body = await (await get(app, '/x')).text();

  assert.ok(body.includes('<title>Demo - NOT FOUND</title>'));
});

test('Application - dispatch before setUp is a bodiless 500', async () => {
  const app = createTestApp().get('/', () => 'hi');

  const response = await get(app, '/');

  assert.equal(response.status, 500);
  assert.equal(response.body, null);
});

test('Application - interceptors nest by group', async () => {
  const trace: string[] = [];
  const app = createTestApp()
    .interceptor('/', tracer(trace, 'audit'), { group: 10 })
    .interceptor('/', tracer(trace, 'auth'), { group: 1 })
    .interceptor('/api', tracer(trace, 'api'), { group: 1 })
    .get('/api/ping', () => {
      trace.push('ping');
      return 'pong';
    });
  await app.setUp();

  assert.equal(await (await get(app, '/api/ping')).text(), 'pong');
  assert.deepEqual(trace, [
    'auth before',
    'api before',
    'audit before',
    'ping',
    'audit after',
    'api after',
    'auth after',
  ]);
});

test('Application - route options set the status and content type', async () => {
  const app = createTestApp().post('/notes', () => 'created', {
    statusCode: 201,
    contentType: 'text/markdown',
  });
  await app.setUp();

  const response = await app.dispatch(new Request('http://localhost/notes', { method: 'POST' }));

  assert.equal(response.status, 201);
  assert.equal(response.headers.get('content-type'), 'text/markdown');
  assert.equal(await response.text(), 'created');
});

test('Application - ErrorResponse values keep their status', async () => {
  const app = createTestApp().get('/orders/:id', ({ id }) => new ErrorResponse(404, { missing: id }), {
    params: [{ name: 'id', marker: 'path', type: 'int' }],
  });
  await app.setUp();

  const response = await get(app, '/orders/12');

  assert.equal(response.status, 404);
  assert.deepEqual(await response.json(), { missing: 12 });
});

test('Application - declared body types are enforced', async () => {
  const app = createTestApp().post('/echo', ({ payload }) => payload, {
    bodyTypes: ['json'],
    params: [{ name: 'payload', marker: 'body' }],
  });
  await app.setUp();

  const accepted = await app.dispatch(
    new Request('http://localhost/echo', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ text: 'hi' }),
    })
  );
  assert.equal(accepted.status, 200);
  assert.deepEqual(await accepted.json(), { text: 'hi' });

  const rejected = await app.dispatch(
    new Request('http://localhost/echo', {
      method: 'POST',
      headers: { 'content-type': 'text/plain' },
      body: 'hi',
    })
  );
  assert.equal(rejected.status, 400);
  assert.equal(await rejected.text(), 'Unsupported request body type "text", expected json');
});

test('Application - custom error handlers replace the built-in page', async () => {
  const app = createTestApp().errorHandler(404, (_params, { request }) => ({
    missing: request.path,
  }));
  await app.setUp();

  const response = await get(app, '/nope');

  assert.equal(response.status, 404);
  assert.deepEqual(await response.json(), { missing: '/nope' });
});

test('Application - fallback handler replaces 404', async () => {
  const app = createTestApp().setFallbackHandler(() => 'fallback page');
  await app.setUp();

  const response = await get(app, '/anything/here');

  assert.equal(response.status, 200);
  assert.equal(await response.text(), 'fallback page');
});

test('Application - redirect helper', async () => {
  const app = createTestApp()
    .get('/old', () => {
      redirect('/new');
    })
    .get('/moved', () => {
      redirect('https://example.com/elsewhere', 301);
      return 'ignored';
    });
  await app.setUp();

  const found = await get(app, '/old');
  assert.equal(found.status, 302);
  assert.equal(found.headers.get('location'), 'http://localhost/new');

  const moved = await get(app, '/moved');
  assert.equal(moved.status, 301);
  assert.equal(moved.headers.get('location'), 'https://example.com/elsewhere');
});

test('Application - basic authentication interceptor', async () => {
  const app = createTestApp()
    .interceptor('/admin', (_params, { chain }) => {
      if (authenticateBasic('admin', 'test-secret', { realm: 'admin area' })) {
        return chain.next();
      }
      chain.interrupt();
    })
    .get('/admin/stats', () => ({ users: 3 }));
  await app.setUp();

  const denied = await get(app, '/admin/stats');
  assert.equal(denied.status, 401);
  assert.equal(denied.headers.get('www-authenticate'), 'Basic realm="admin area"');

  const wrong = await get(app, '/admin/stats', {
    authorization: `Basic ${Buffer.from('admin:wrong').toString('base64')}`,
  });
  assert.equal(wrong.status, 401);

  const allowed = await get(app, '/admin/stats', {
    authorization: `Basic ${Buffer.from('admin:test-secret').toString('base64')}`,
  });
  assert.equal(allowed.status, 200);
  assert.deepEqual(await allowed.json(), { users: 3 });
});

test('Application - services are injected by token', async () => {
  class Clock {
    now(): string {
      return 'noon';
    }
  }
  const app = createTestApp()
    .addModule((services) => {
      services.register(Clock, new Clock());
    })
    .get('/time', ({ clock }) => (clock instanceof Clock ? clock.now() : 'unknown'), {
      params: [{ name: 'clock', marker: 'inject', metadata: Clock }],
    });
  await app.setUp();

  assert.equal(await (await get(app, '/time')).text(), 'noon');
});

test('Application - plugins install after their dependencies', async () => {
  const installed: string[] = [];
  const app = createTestApp()
    .addPlugin(
      definePlugin({
        name: 'greetings',
        dependencies: ['names'],
        install(manager) {
          installed.push('greetings');
          manager.addRoute('GET', '/greet/:who', ({ who }) => `hello ${String(who)}`, {
            params: [{ name: 'who', marker: 'name' }],
          });
        },
      })
    )
    .addPlugin(
      definePlugin({
        name: 'names',
        install(manager) {
          installed.push('names');
          manager.addParameterProvider('name', (_metadata, _type, _handler, paramName, request) =>
            request.params[paramName]?.toUpperCase()
          );
        },
      })
    );
  await app.setUp();

  assert.deepEqual(installed, ['names', 'greetings']);
  assert.equal(await (await get(app, '/greet/ada')).text(), 'hello ADA');
});

test('Application - a missing plugin dependency fails setUp', async () => {
  const app = createTestApp().addPlugin(
    definePlugin({ name: 'orphan', dependencies: ['ghost'], install() {} })
  );

  await assert.rejects(app.setUp(), (error: unknown) => {
    assert.ok(error instanceof ConfigurationError);
    assert.equal(error.message, 'Plugin not found: ghost (required by orphan)');
    return true;
  });
  assert.equal(app.isSetUp, false);
});

test('Application - registration after setUp is rejected', async () => {
  const app = createTestApp();
  await app.setUp();

  assert.throws(() => app.get('/late', () => null), ConfigurationError);
});

test('Application - tearDown clears registrations until the next setUp', async () => {
  const app = createTestApp()
    .get('/direct', () => 'direct')
    .addPlugin(
      definePlugin({
        name: 'status',
        install(manager) {
          manager.addRoute('GET', '/status', () => 'up');
        },
      })
    );
  await app.setUp();
  assert.equal(await (await get(app, '/direct')).text(), 'direct');

  await app.tearDown('test');
  assert.equal((await get(app, '/status')).status, 500);

  await app.setUp();
  assert.equal(await (await get(app, '/status')).text(), 'up');
  assert.equal((await get(app, '/direct')).status, 404);
});

test('Application - lifecycle and request events', async () => {
  const seen: string[] = [];
  const app = createTestApp()
    .get('/ok', () => 'ok')
    .get('/fail', () => {
      throw new Error('kaput');
    })
    .on('app:setup', ({ routes }) => {
      seen.push(`setup:${routes}`);
    })
    .on('request:start', ({ method, path }) => {
      seen.push(`start:${method} ${path}`);
    })
    .on('request:error', ({ status, error }) => {
      seen.push(`error:${status}:${error instanceof Error ? error.message : ''}`);
    })
    .on('request:end', ({ path, status }) => {
      seen.push(`end:${path} ${status}`);
    });
  await app.setUp();

  await get(app, '/ok');
  await get(app, '/fail');

  assert.deepEqual(seen, [
    'setup:2',
    'start:GET /ok',
    'end:/ok 200',
    'start:GET /fail',
    'error:500:kaput',
    'end:/fail 500',
  ]);
});

test('Application - middleware wraps the chain', async () => {
  const app = createTestApp()
    .use(async (request, next) => {
      const response = await next();
      const headers = new Headers(response.headers);
      headers.set('x-request-path', request.path);
      return new Response(response.body, { status: response.status, headers });
    })
    .use((request, next) =>
      request.path === '/blocked' ? new Response('blocked', { status: 423 }) : next()
    )
    .get('/open', () => 'open')
    .get('/blocked', () => 'unreachable');
  await app.setUp();

  const open = await get(app, '/open');
  assert.equal(open.headers.get('x-request-path'), '/open');
  assert.equal(await open.text(), 'open');

  const blocked = await get(app, '/blocked');
  assert.equal(blocked.status, 423);
  assert.equal(blocked.headers.get('x-request-path'), '/blocked');
  assert.equal(await blocked.text(), 'blocked');
});

test('Application - middleware failures are routed to the error handlers', async () => {
  const app = createTestApp()
    .use(() => {
      throw new ExpectedAbort(429, 'slow down');
    })
    .get('/', () => 'hi');
  await app.setUp();

  const response = await get(app, '/');

  assert.equal(response.status, 429);
  assert.equal(await response.text(), 'slow down');
});

test('Application - concurrent requests each see their own context', async () => {
  const app = createTestApp()
    .interceptor('/', async (_params, { chain: current }) => {
      request().attributes.set('seenBy', request().path);
      await current.next();
    })
    .get(
      '/slow/:ms',
      async ({ ms }) => {
        await delay(typeof ms === 'number' ? ms : 0);
        return { path: request().path, seenBy: request().attributes.get('seenBy') };
      },
      { params: [{ name: 'ms', marker: 'path', type: 'int' }] }
    );
  await app.setUp();

  const [slow, fast] = await Promise.all([get(app, '/slow/30'), get(app, '/slow/1')]);

  assert.deepEqual(await slow.json(), { path: '/slow/30', seenBy: '/slow/30' });
  assert.deepEqual(await fast.json(), { path: '/slow/1', seenBy: '/slow/1' });
});

test('Application - ambient helpers fail outside a dispatch', () => {
  assert.throws(() => request(), ContextError);
  assert.throws(() => chain(), ContextError);
  assert.throws(() => redirect('/x'), ContextError);
});

test('Application - a stalled interceptor fails when the dispatch signal fires', async () => {
  const app = createTestApp()
    .interceptor('/', () => {
      // never advances
    }, { name: 'stuck' })
    .get('/', () => 'never');
  await app.setUp();

  const response = await app.dispatch(new Request('http://localhost/'), {
    signal: AbortSignal.timeout(20),
  });

  assert.equal(response.status, 500);
  assert.match(await response.text(), /ChainStallError: Chain did not advance: &quot;stuck&quot;/);
});

test('Application - a throwing request:error listener leaves the error response intact', async () => {
  setLogger(new Logger({ output: () => {} }));
  const trace: string[] = [];
  const app = createTestApp()
    .on('request:error', () => {
      throw new Error('listener broke');
    })
    .interceptor('/', async (_params, { chain }) => {
      await chain.next();
      trace.push(`after ${chain.error instanceof Error ? chain.error.message : 'none'}`);
    })
    .get('/', () => {
      throw new Error('handler broke');
    });
  await app.setUp();

  const response = await get(app, '/');

  assert.equal(response.status, 500);
  assert.equal(response.headers.get('content-type'), 'text/html');
  assert.match(await response.text(), /Error: handler broke/);
  assert.deepEqual(trace, ['after handler broke']);
});

test('Application - the error page carries the stack trace by default', async () => {
  const app = createTestApp().get('/', () => {
    throw new Error('kaboom');
  });
  await app.setUp();

  const body = await (await get(app, '/')).text();

  assert.match(body, /Error: kaboom/);
  assert.match(body, /\n    at /);
});

test('Application - a serialization failure is routed as a 500', async () => {
  const app = createTestApp().get('/loop', () => {
    const node: Record<string, unknown> = { name: 'loop' };
    node.self = node;
    return node;
  });
  await app.setUp();

  const response = await get(app, '/loop');

  assert.equal(response.status, 500);
  assert.equal(response.headers.get('content-type'), 'text/html');
  assert.match(
    await response.text(),
    /SerializationError: Cannot serialize response value: Converting circular structure to JSON/
  );
});
