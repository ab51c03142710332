/**
 * HTTP Basic Authentication
 *
 * Helpers for interceptors guarding routes with Basic credentials. They read
 * the request of the current dispatch.
 */

import { Buffer } from 'node:buffer';
import { timingSafeEqual } from 'node:crypto';
import { request, setResponse } from '../chain/context.ts';

export interface Credentials {
  username: string;
  password: string;
}

export interface BasicAuthOptions {
  /** When set, a failed check replaces the response with a 401 challenge */
  realm?: string;
}

/**
 * Decode a `Basic` authorization header value
 */
export function decodeBasicCredentials(header: string | null): Credentials | null {
  if (!header) return null;

  const [scheme, token] = header.trim().split(/\s+/, 2);
  if (scheme !== 'Basic' || !token) return null;

  const decoded = Buffer.from(token, 'base64').toString('utf8');
  const idx = decoded.indexOf(':');
  if (idx <= 0) return null;

  return {
    username: decoded.slice(0, idx),
    password: decoded.slice(idx + 1),
  };
}

/**
 * Credentials sent with the current request, if any
 */
export function parseAuthorizationHeader(): Credentials | null {
  return decodeBasicCredentials(request().header('authorization'));
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * Check the current request's credentials
 *
 * @example
 * ```typescript
 * app.interceptor('/admin', (_params, { chain }) => {
 *   if (authenticateBasic('admin', 'test-secret', { realm: 'admin' })) {
 *     return chain.next();
 *   }
 *   chain.interrupt();
 * });
 * ```
 */
export function authenticateBasic(
  username: string,
  password: string,
  options: BasicAuthOptions = {}
): boolean {
  const credentials = parseAuthorizationHeader();
  const ok =
    credentials !== null &&
    safeEqual(credentials.username, username) &&
    safeEqual(credentials.password, password);

  if (!ok && options.realm !== undefined) {
    setResponse(
      new Response(null, {
        status: 401,
        headers: { 'www-authenticate': `Basic realm="${options.realm}"` },
      })
    );
  }

  return ok;
}
