/**
 * Middleware Pipeline
 *
 * Outer middleware, run in the request context around the whole interceptor
 * chain (onion model). Each middleware can:
 * - Inspect the request before the chain runs
 * - Short-circuit with its own response
 * - Inspect or replace the response after the chain
 */

import { findContext } from '../chain/context.ts';
import type { DispatchRequest } from '../http/request.ts';
import type { Middleware, Next } from '../http/types.ts';
import { getLogger } from '../telemetry/logger.ts';

export class MiddlewarePipeline {
  private middleware: Middleware[] = [];

  use(middleware: Middleware): this {
    this.middleware.push(middleware);
    return this;
  }

  remove(middleware: Middleware): this {
    const index = this.middleware.indexOf(middleware);
    if (index !== -1) {
      this.middleware.splice(index, 1);
    }
    return this;
  }

  clear(): this {
    this.middleware = [];
    return this;
  }

  get length(): number {
    return this.middleware.length;
  }

  /**
   * Execute the pipeline, ending in the final handler
   */
  async execute(request: DispatchRequest, finalHandler: Next): Promise<Response> {
    const logger = findContext()?.logger ?? getLogger();

    const dispatch = async (index: number): Promise<Response> => {
      const middleware = this.middleware[index];
      if (!middleware) {
        return await finalHandler();
      }

      const name = middleware.name || `middleware[${index}]`;
      logger.debug(`Entering ${name}`);
      let called = false;
      const response = await middleware(request, () => {
        if (called) {
          return Promise.reject(new Error(`next() called twice by ${name}`));
        }
        called = true;
        return dispatch(index + 1);
      });
      logger.debug(`Exiting ${name}`, { status: response.status });
      return response;
    };

    return await dispatch(0);
  }
}

/**
 * Create a middleware that runs conditionally
 */
export function conditional(
  condition: (request: DispatchRequest) => boolean,
  middleware: Middleware
): Middleware {
  return async (request, next) => {
    if (condition(request)) {
      return await middleware(request, next);
    }
    return await next();
  };
}

/**
 * Create a middleware that runs for paths under a prefix
 */
export function forPath(pathPrefix: string, middleware: Middleware): Middleware {
  return conditional((request) => request.path.startsWith(pathPrefix), middleware);
}

/**
 * Create a middleware that runs for specific methods
 */
export function forMethods(methods: string[], middleware: Middleware): Middleware {
  const methodSet = new Set(methods.map((m) => m.toUpperCase()));
  return conditional((request) => methodSet.has(request.method), middleware);
}
