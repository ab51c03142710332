/**
 * Request Context
 *
 * Per-request state, bound with AsyncLocalStorage for the lifetime of one
 * dispatch. Code running anywhere inside the request's continuation tree can
 * reach it without having it passed along; concurrent dispatches each see
 * their own.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ContextError } from '../errors.ts';
import type { DispatchRequest } from '../http/request.ts';
import type { RouteEntry } from '../registry/entries.ts';
import type { ServiceLocator } from '../services/locator.ts';
import type { Logger } from '../telemetry/logger.ts';
import type { Chain } from './types.ts';

export interface RequestContextInit {
  id: string;
  request: DispatchRequest;
  services: ServiceLocator;
  logger: Logger;
}

export class RequestContext {
  readonly id: string;
  readonly request: DispatchRequest;
  readonly services: ServiceLocator;
  readonly logger: Logger;

  /** View of the element currently holding control */
  chain: Chain | null = null;
  route: RouteEntry | null = null;
  /** Index of the running element in the interceptor + target list */
  cursor = 0;
  interrupted = false;
  error: unknown = undefined;

  private _response: Response | null = null;
  private _locked = false;

  constructor(init: RequestContextInit) {
    this.id = init.id;
    this.request = init.request;
    this.services = init.services;
    this.logger = init.logger;
  }

  get response(): Response | null {
    return this._response;
  }

  /**
   * True once an explicit interrupt value has become the response
   */
  get responseLocked(): boolean {
    return this._locked;
  }

  /**
   * Replace the in-progress response. Ignored once the response is locked.
   */
  setResponse(response: Response): boolean {
    if (this._locked) {
      return false;
    }
    this._response = response;
    return true;
  }

  lockResponse(response: Response): void {
    this._response = response;
    this._locked = true;
  }
}

const storage = new AsyncLocalStorage<RequestContext>();

/**
 * Run a function with a context bound for its whole continuation tree
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return storage.run(context, fn);
}

/**
 * The context of the request being dispatched, if any
 */
export function findContext(): RequestContext | undefined {
  return storage.getStore();
}

export function currentContext(): RequestContext {
  const context = storage.getStore();
  if (!context) {
    throw new ContextError();
  }
  return context;
}

export function request(): DispatchRequest {
  return currentContext().request;
}

export function chain(): Chain {
  const current = currentContext().chain;
  if (!current) {
    throw new ContextError('No chain element is running for the current request');
  }
  return current;
}

export function getResponse(): Response | null {
  return currentContext().response;
}

/**
 * Replace the current response; returns false when an interrupt value
 * already fixed it
 */
export function setResponse(response: Response): boolean {
  return currentContext().setResponse(response);
}

/**
 * Interrupt the chain and route to the error handler for a status
 */
export function abort(statusCode: number): void {
  chain().interrupt(statusCode);
}

export type RedirectStatus = 301 | 302 | 303 | 307 | 308;

/**
 * Interrupt the chain with a redirect, resolved against the request URL
 */
export function redirect(url: string, statusCode: RedirectStatus = 302): void {
  const location = new URL(url, request().url).toString();
  chain().interrupt(undefined, Response.redirect(location, statusCode));
}
