/**
 * HTTP Server
 *
 * Adapts node:http to the Fetch API: incoming messages become `Request`s,
 * handed to the dispatcher with the request timeout as an AbortSignal, and
 * the resulting `Response` is streamed back.
 */

import { once } from 'node:events';
import {
  createServer,
  type IncomingMessage,
  type Server as NodeServer,
  type ServerResponse,
} from 'node:http';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import type { DispatchOptions } from './types.ts';

export type FetchHandler = (request: Request, options: DispatchOptions) => Promise<Response>;

export interface ListenAddress {
  hostname: string;
  port: number;
}

export interface ServerOptions {
  port?: number;
  hostname?: string;
  /** Milliseconds before a dispatch is told to give up */
  requestTimeout?: number;
  logger?: Logger;
  onListen?: (address: ListenAddress) => void;
}

/**
 * Convert a node:http request into a Fetch API request
 */
export function toRequest(req: IncomingMessage): Request {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    headers.set(name, Array.isArray(value) ? value.join(', ') : value);
  }

  const method = req.method ?? 'GET';
  const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
  const hasBody = method !== 'GET' && method !== 'HEAD';

  return new Request(url, {
    method,
    headers,
    body: hasBody ? req : undefined,
    duplex: 'half',
  });
}

/**
 * Stream a Fetch API response into a node:http response
 */
export async function writeResponse(response: Response, res: ServerResponse): Promise<void> {
  res.statusCode = response.status;
  if (response.statusText) {
    res.statusMessage = response.statusText;
  }
  response.headers.forEach((value, name) => {
    res.appendHeader(name, value);
  });

  if (response.body) {
    for await (const chunk of response.body) {
      if (!res.write(chunk)) {
        await once(res, 'drain');
      }
    }
  }
  res.end();
}

/**
 * HTTP server for dispatcher applications
 */
export class Server {
  private server: NodeServer | null = null;
  private logger: Logger;

  constructor(
    private handler: FetchHandler,
    private options: ServerOptions = {}
  ) {
    this.logger = options.logger ?? getLogger();
  }

  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  /**
   * Start listening; resolves with the bound address
   */
  async listen(): Promise<ListenAddress> {
    if (this.server) {
      throw new Error('Server is already listening');
    }

    const server = createServer((req, res) => {
      this.handle(req, res).catch((error: unknown) => {
        this.logger.error('Failed to write response', error);
        res.destroy();
      });
    });
    this.server = server;

    server.listen(this.options.port ?? 8080, this.options.hostname ?? '0.0.0.0');
    await once(server, 'listening');

    const address = server.address();
    const bound: ListenAddress = {
      hostname: this.options.hostname ?? '0.0.0.0',
      port: typeof address === 'object' && address !== null ? address.port : this.options.port ?? 8080,
    };
    this.options.onListen?.(bound);
    return bound;
  }

  /**
   * Stop accepting connections and wait for open ones to finish
   */
  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    const closed = once(server, 'close');
    server.close();
    server.closeIdleConnections();
    await closed;
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    let response: Response;
    try {
      const signal =
        this.options.requestTimeout !== undefined
          ? AbortSignal.timeout(this.options.requestTimeout)
          : undefined;
      response = await this.handler(toRequest(req), { signal });
    } catch (error) {
      this.logger.error('Dispatch failed', error, { method: req.method, url: req.url });
      response = new Response(null, { status: 500 });
    }

    try {
      await writeResponse(response, res);
    } catch (error) {
      this.logger.error('Failed to write response', error, { method: req.method, url: req.url });
      if (res.headersSent) {
        res.destroy();
      } else {
        for (const name of res.getHeaderNames()) {
          res.removeHeader(name);
        }
        res.statusCode = 500;
        res.end();
      }
    }
  }
}
