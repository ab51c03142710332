/**
 * Parameter Resolver
 *
 * Produces a handler's arguments, one declared parameter at a time, through
 * the provider registered for each parameter's marker.
 */

import { ExpectedAbort, ParameterResolutionError } from '../errors.ts';
import type { DispatchRequest } from '../http/request.ts';
import type { HandlerEntry, ParameterSpec, TargetType } from '../registry/entries.ts';
import type { Registry } from '../registry/registry.ts';
import type { ServiceLocator } from '../services/locator.ts';

export interface ResolutionContext {
  request: DispatchRequest;
  services: ServiceLocator;
}

const INTEGER = /^[+-]?\d+$/;

/**
 * Convert a provided value to its declared target type.
 * Returns undefined when the value cannot be converted.
 */
export function convertValue(value: unknown, type: TargetType): unknown {
  switch (type) {
    case 'any':
      return value;
    case 'string':
      if (typeof value === 'string') return value;
      if (typeof value === 'number' || typeof value === 'boolean') return String(value);
      return undefined;
    case 'int': {
      // Outside the safe range the parsed value would silently round
      if (typeof value === 'number') return Number.isSafeInteger(value) ? value : undefined;
      if (typeof value !== 'string' || !INTEGER.test(value.trim())) return undefined;
      const parsed = Number.parseInt(value.trim(), 10);
      return Number.isSafeInteger(parsed) ? parsed : undefined;
    }
    case 'number': {
      if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
      if (typeof value !== 'string' || value.trim() === '') return undefined;
      const parsed = Number(value);
      return Number.isFinite(parsed) ? parsed : undefined;
    }
    case 'boolean':
      if (typeof value === 'boolean') return value;
      if (typeof value === 'string') {
        const normalized = value.trim().toLowerCase();
        if (normalized === 'true') return true;
        if (normalized === 'false') return false;
      }
      return undefined;
  }
}

function describe(value: unknown): string {
  return typeof value === 'string' ? `"${value}"` : String(value);
}

/**
 * Resolves declared parameters against the registry's providers
 */
export class ParameterResolver {
  constructor(private registry: Registry) {}

  /**
   * Resolve a single parameter of a handler
   */
  async resolve(
    handler: HandlerEntry,
    spec: ParameterSpec,
    context: ResolutionContext
  ): Promise<unknown> {
    const entry = this.registry.provider(spec.marker);
    if (!entry) {
      throw new ParameterResolutionError(handler.name, spec.name, `no provider for marker "${spec.marker}"`, {
        statusCode: 500,
      });
    }

    const type = spec.type ?? 'any';
    let provided: unknown;
    try {
      provided = await entry.provider(
        spec.metadata,
        type,
        handler.name,
        spec.name,
        context.request,
        context.services
      );
    } catch (error) {
      if (error instanceof ParameterResolutionError) {
        throw error;
      }
      throw new ParameterResolutionError(
        handler.name,
        spec.name,
        error instanceof Error ? error.message : String(error),
        {
          statusCode: error instanceof ExpectedAbort ? error.statusCode : 400,
          cause: error,
        }
      );
    }

    if (provided === undefined) {
      if (spec.defaultValue !== undefined) return spec.defaultValue;
      if (spec.optional) return undefined;
      throw new ParameterResolutionError(handler.name, spec.name, 'required value is missing');
    }

    const converted = convertValue(provided, type);
    if (converted === undefined) {
      throw new ParameterResolutionError(
        handler.name,
        spec.name,
        `cannot convert ${describe(provided)} to ${type}`
      );
    }
    return converted;
  }

  /**
   * Resolve every parameter of a handler, sequentially in declaration order
   */
  async resolveAll(
    handler: HandlerEntry,
    context: ResolutionContext
  ): Promise<Record<string, unknown>> {
    const params: Record<string, unknown> = {};
    for (const spec of handler.params) {
      params[spec.name] = await this.resolve(handler, spec, context);
    }
    return params;
  }
}
