/**
 * Switchyard Entry Point
 *
 * Boots a small demo application: configuration, services, an interceptor,
 * a couple of routes and the HTTP server.
 */

import {
  Application,
  ErrorResponse,
  loadConfig,
  ServiceKey,
  type Handler,
} from './framework/mod.ts';

const GREETING = new ServiceKey<string>('greeting');

const timing: Handler = async (_params, { chain, request }) => {
  await chain.next();
  request.attributes.set('elapsed', performance.now() - request.startTime);
};

const hello: Handler = ({ name, greeting }) => ({
  message: `${String(greeting)}, ${String(name)}!`,
});

const getUser: Handler = ({ id }) =>
  id === 0 ? new ErrorResponse(404, { error: 'no such user' }) : { id };

async function main(): Promise<void> {
  const config = await loadConfig();
  const app = new Application({ config });

  app
    .addModule((services) => {
      services.register(GREETING, 'Hello');
    })
    .interceptor('/', timing, { group: 0 })
    .get('/hello/:name', hello, {
      params: [
        { name: 'name', marker: 'path', type: 'string' },
        { name: 'greeting', marker: 'inject', metadata: GREETING },
      ],
    })
    .get('/users/:id(\\d+)', getUser, {
      name: 'getUser',
      params: [{ name: 'id', marker: 'path', type: 'int' }],
    });

  const shutdown = () => {
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        app.getLogger().error('Shutdown failed', error);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await app.listen();
}

main().catch((error: unknown) => {
  console.error('Failed to start Switchyard:', error);
  process.exit(1);
});
