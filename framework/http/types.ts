/**
 * HTTP Type Definitions
 */

import type { DispatchRequest } from './request.ts';

/**
 * HTTP methods understood by the matcher
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'HEAD';

export const HTTP_METHODS: readonly HttpMethod[] = [
  'GET',
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
  'OPTIONS',
  'HEAD',
];

/**
 * Detected shape of a request body
 */
export type BodyType = 'json' | 'form' | 'text' | 'binary';

/**
 * Session data attached to a request by a session loader
 */
export interface SessionData {
  [key: string]: unknown;
}

/**
 * Loads the session for a request. Session storage lives outside the dispatcher.
 */
export type SessionLoader = (request: Request) => Promise<SessionData | null> | SessionData | null;

/**
 * Middleware next function
 */
export type Next = () => Promise<Response>;

/**
 * Outer middleware, run around the whole interceptor chain
 */
export type Middleware = (
  request: DispatchRequest,
  next: Next
) => Promise<Response> | Response;

/**
 * Options accepted by a single dispatch
 */
export interface DispatchOptions {
  /**
   * Deadline applied by the transport; a chain element that has not advanced
   * when it fires fails with ChainStallError.
   */
  signal?: AbortSignal;
}
