/**
 * Built-in Parameter Providers
 */

import { isServiceToken } from '../services/locator.ts';
import type { ParameterProvider } from '../registry/entries.ts';
import type { Registry } from '../registry/registry.ts';

export const BuiltinMarkers = {
  PATH: 'path',
  QUERY: 'query',
  HEADER: 'header',
  FIELD: 'field',
  BODY: 'body',
  ATTRIBUTE: 'attribute',
  INJECT: 'inject',
  REQUEST: 'request',
} as const;

/**
 * Lookup key for name-based providers: a string metadata overrides the
 * parameter name
 */
function keyOf(metadata: unknown, paramName: string): string {
  return typeof metadata === 'string' && metadata !== '' ? metadata : paramName;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const pathProvider: ParameterProvider = (metadata, _type, _handler, paramName, request) =>
  request.params[keyOf(metadata, paramName)];

export const queryProvider: ParameterProvider = (metadata, _type, _handler, paramName, request) =>
  request.query.get(keyOf(metadata, paramName)) ?? undefined;

export const headerProvider: ParameterProvider = (metadata, _type, _handler, paramName, request) =>
  request.header(keyOf(metadata, paramName)) ?? undefined;

export const fieldProvider: ParameterProvider = async (
  metadata,
  _type,
  _handler,
  paramName,
  request
) => {
  const body = await request.body();
  return isRecord(body) ? body[keyOf(metadata, paramName)] : undefined;
};

export const bodyProvider: ParameterProvider = async (_metadata, _type, _handler, _param, request) =>
  (await request.body()) ?? undefined;

export const attributeProvider: ParameterProvider = (
  metadata,
  _type,
  _handler,
  paramName,
  request
) => request.attributes.get(keyOf(metadata, paramName));

export const injectProvider: ParameterProvider = (
  metadata,
  _type,
  _handler,
  _param,
  _request,
  services
) => {
  if (!isServiceToken(metadata)) {
    throw new Error('inject parameters need a service class or ServiceKey as metadata');
  }
  return services.resolve(metadata);
};

export const requestProvider: ParameterProvider = (_metadata, _type, _handler, _param, request) =>
  request;

/**
 * Register the built-in providers on a registry
 */
export function registerBuiltinProviders(registry: Registry): void {
  registry
    .addProvider(BuiltinMarkers.PATH, pathProvider, ['route', 'interceptor', 'error'])
    .addProvider(BuiltinMarkers.QUERY, queryProvider, ['route', 'interceptor', 'error'])
    .addProvider(BuiltinMarkers.HEADER, headerProvider, ['route', 'interceptor', 'error'])
    .addProvider(BuiltinMarkers.FIELD, fieldProvider, ['route', 'interceptor'])
    .addProvider(BuiltinMarkers.BODY, bodyProvider, ['route'])
    .addProvider(BuiltinMarkers.ATTRIBUTE, attributeProvider, ['route', 'interceptor', 'error'])
    .addProvider(BuiltinMarkers.INJECT, injectProvider, ['route', 'interceptor', 'error'])
    .addProvider(BuiltinMarkers.REQUEST, requestProvider, ['route', 'interceptor', 'error']);
}
