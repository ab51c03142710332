/**
 * Registry Entries
 *
 * Immutable records describing routes, interceptors, error handlers, parameter
 * providers and response processors.
 */

import type { Chain } from '../chain/types.ts';
import type { DispatchRequest } from '../http/request.ts';
import type { BodyType, HttpMethod } from '../http/types.ts';
import type { RouteTemplate } from '../router/template.ts';
import type { ServiceLocator } from '../services/locator.ts';

export type HandlerKind = 'route' | 'interceptor' | 'error';

export const HANDLER_KINDS: readonly HandlerKind[] = ['route', 'interceptor', 'error'];

/**
 * Target type a string input is converted to
 */
export type TargetType = 'string' | 'int' | 'number' | 'boolean' | 'any';

/**
 * One declared handler parameter
 */
export interface ParameterSpec {
  name: string;
  /** Selects the provider */
  marker: string;
  type?: TargetType;
  /** Passed to the provider as-is */
  metadata?: unknown;
  optional?: boolean;
  defaultValue?: unknown;
}

/**
 * Marker attached to a handler, e.g. to bind response processors
 */
export interface Annotation {
  marker: string;
  metadata?: unknown;
}

export interface HandlerContext {
  request: DispatchRequest;
  chain: Chain;
  services: ServiceLocator;
  handlerName: string;
}

/**
 * Routes, interceptors and error handlers all share this shape. Parameters are
 * keyed by their declared names.
 */
export type Handler = (params: Record<string, unknown>, context: HandlerContext) => unknown;

interface HandlerEntryBase {
  readonly name: string;
  readonly handler: Handler;
  readonly params: readonly ParameterSpec[];
  readonly annotations: readonly Annotation[];
}

export interface RouteEntry extends HandlerEntryBase {
  readonly kind: 'route';
  readonly method: HttpMethod;
  readonly template: RouteTemplate;
  /** Accepted request body types; undefined accepts anything */
  readonly bodyTypes?: readonly BodyType[];
  /** Provisional status of the handler's response */
  readonly statusCode: number;
  readonly contentType?: string;
}

/**
 * Path selector for interceptors: a prefix matched at segment boundaries
 * (`/api` and `/api/*` both cover `/api` and `/api/users`) or a RegExp
 */
export type PathPattern = string | RegExp;

export interface InterceptorEntry extends HandlerEntryBase {
  readonly kind: 'interceptor';
  readonly pattern: PathPattern;
  /** Lower groups run earlier */
  readonly group: number;
}

export interface ErrorHandlerEntry extends HandlerEntryBase {
  readonly kind: 'error';
  readonly statusCode: number | 'default';
}

export type HandlerEntry = RouteEntry | InterceptorEntry | ErrorHandlerEntry;

/**
 * Produces a parameter value; `undefined` means absent
 */
export type ParameterProvider = (
  metadata: unknown,
  targetType: TargetType,
  handlerName: string,
  paramName: string,
  request: DispatchRequest,
  services: ServiceLocator
) => unknown;

export interface ProviderEntry {
  readonly marker: string;
  readonly provider: ParameterProvider;
  readonly kinds: readonly HandlerKind[];
}

/**
 * Transforms a handler's return value before it is written
 */
export type ResponseProcessor = (
  metadata: unknown,
  handlerName: string,
  value: unknown,
  services: ServiceLocator
) => unknown;

export interface ProcessorEntry {
  readonly processor: ResponseProcessor;
  /** Bound processors only apply to handlers annotated with this marker */
  readonly marker?: string;
}

export interface BoundProcessor {
  processor: ResponseProcessor;
  metadata: unknown;
}

function normalizePrefix(prefix: string): string {
  let normalized = prefix.endsWith('/*') ? prefix.slice(0, -2) : prefix;
  while (normalized.endsWith('/')) {
    normalized = normalized.slice(0, -1);
  }
  return normalized;
}

/**
 * Check an interceptor pattern against a request path
 */
export function pathMatches(pattern: PathPattern, path: string): boolean {
  if (pattern instanceof RegExp) {
    pattern.lastIndex = 0;
    return pattern.test(path);
  }

  const prefix = normalizePrefix(pattern);
  if (prefix === '') return true;
  return path === prefix || path.startsWith(`${prefix}/`);
}
