/**
 * Handler Registry
 *
 * Holds every route, interceptor, error handler, parameter provider and
 * response processor. Built before serving starts, then sealed and read
 * without synchronization by concurrent dispatches.
 */

import { ConfigurationError } from '../errors.ts';
import type { HttpMethod } from '../http/types.ts';
import { Matcher, type RouteMatch } from '../router/matcher.ts';
import {
  HANDLER_KINDS,
  pathMatches,
  type BoundProcessor,
  type ErrorHandlerEntry,
  type HandlerEntry,
  type HandlerKind,
  type InterceptorEntry,
  type ParameterProvider,
  type ProcessorEntry,
  type ProviderEntry,
  type ResponseProcessor,
  type RouteEntry,
} from './entries.ts';

/**
 * Registry of dispatch handlers
 */
export class Registry {
  private matcher = new Matcher<RouteEntry>();
  private routeNames = new Map<HttpMethod, Set<string>>();
  private interceptors: InterceptorEntry[] = [];
  private errorHandlers = new Map<number | 'default', ErrorHandlerEntry>();
  private providers = new Map<string, ProviderEntry>();
  private processors: ProcessorEntry[] = [];
  private sealed = false;

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Register a route, interceptor or error handler
   */
  register(entry: HandlerEntry): this {
    this.assertOpen(entry.name);

    switch (entry.kind) {
      case 'route':
        this.registerRoute(entry);
        break;
      case 'interceptor':
        this.interceptors.push(entry);
        // Array.prototype.sort is stable: equal groups keep registration order
        this.interceptors.sort((a, b) => a.group - b.group);
        break;
      case 'error':
        if (this.errorHandlers.has(entry.statusCode)) {
          throw new ConfigurationError(
            entry.statusCode === 'default'
              ? 'A default error handler is already registered'
              : `An error handler for status ${entry.statusCode} is already registered`
          );
        }
        this.errorHandlers.set(entry.statusCode, entry);
        break;
    }

    return this;
  }

  /**
   * Register the provider for a parameter marker
   */
  addProvider(
    marker: string,
    provider: ParameterProvider,
    kinds: readonly HandlerKind[] = ['route']
  ): this {
    this.assertOpen(`provider "${marker}"`);
    if (this.providers.has(marker)) {
      throw new ConfigurationError(`A parameter provider for "${marker}" is already registered`);
    }
    if (kinds.length === 0 || kinds.some((kind) => !HANDLER_KINDS.includes(kind))) {
      throw new ConfigurationError(`Invalid handler kinds for provider "${marker}"`);
    }
    this.providers.set(marker, { marker, provider, kinds: [...kinds] });
    return this;
  }

  /**
   * Register a response processor; with a marker it only applies to handlers
   * annotated with that marker
   */
  addProcessor(processor: ResponseProcessor, marker?: string): this {
    this.assertOpen('response processor');
    this.processors.push({ processor, marker });
    return this;
  }

  /**
   * Validate every parameter against the providers and freeze the registry
   */
  seal(): void {
    if (this.sealed) return;

    for (const entry of this.entries()) {
      this.validate(entry);
    }

    this.sealed = true;
  }

  /**
   * Check that every parameter of a handler has a provider allowed for its kind
   */
  validate(entry: HandlerEntry): void {
    for (const param of entry.params) {
      const provider = this.providers.get(param.marker);
      if (!provider) {
        throw new ConfigurationError(
          `No parameter provider for marker "${param.marker}" (parameter "${param.name}" of "${entry.name}")`
        );
      }
      if (!provider.kinds.includes(entry.kind)) {
        throw new ConfigurationError(
          `Marker "${param.marker}" is not allowed on ${entry.kind} handlers (parameter "${param.name}" of "${entry.name}")`
        );
      }
    }
  }

  get interceptorCount(): number {
    return this.interceptors.length;
  }

  /**
   * Remove everything and accept registrations again
   */
  clear(): void {
    this.matcher.clear();
    this.routeNames.clear();
    this.interceptors = [];
    this.errorHandlers.clear();
    this.providers.clear();
    this.processors = [];
    this.sealed = false;
  }

  match(method: string, path: string): RouteMatch<RouteEntry> | null {
    return this.matcher.match(method, path);
  }

  allowedMethods(path: string): HttpMethod[] {
    return this.matcher.allowedMethods(path);
  }

  /**
   * Interceptors covering a path, by ascending group then registration order
   */
  interceptorsFor(path: string): InterceptorEntry[] {
    return this.interceptors.filter((entry) => pathMatches(entry.pattern, path));
  }

  /**
   * Error handler for a status, falling back to the default entry
   */
  errorHandlerFor(statusCode: number): ErrorHandlerEntry | undefined {
    return this.errorHandlers.get(statusCode) ?? this.errorHandlers.get('default');
  }

  provider(marker: string): ProviderEntry | undefined {
    return this.providers.get(marker);
  }

  /**
   * Processors applying to a handler, in registration order
   */
  processorsFor(entry: HandlerEntry): BoundProcessor[] {
    const bound: BoundProcessor[] = [];

    for (const { processor, marker } of this.processors) {
      if (marker === undefined) {
        bound.push({ processor, metadata: undefined });
        continue;
      }
      const annotation = entry.annotations.find((a) => a.marker === marker);
      if (annotation) {
        bound.push({ processor, metadata: annotation.metadata });
      }
    }

    return bound;
  }

  routes(): RouteEntry[] {
    return this.matcher.getRoutes();
  }

  private *entries(): Iterable<HandlerEntry> {
    yield* this.matcher.getRoutes();
    yield* this.interceptors;
    yield* this.errorHandlers.values();
  }

  private registerRoute(entry: RouteEntry): void {
    let names = this.routeNames.get(entry.method);
    if (!names) {
      names = new Set();
      this.routeNames.set(entry.method, names);
    }
    if (names.has(entry.name)) {
      throw new ConfigurationError(`Route "${entry.name}" is already registered for ${entry.method}`);
    }
    names.add(entry.name);
    this.matcher.add(entry);
  }

  private assertOpen(what: string): void {
    if (this.sealed) {
      throw new ConfigurationError(`Cannot register ${what}: the registry is sealed`);
    }
  }
}
