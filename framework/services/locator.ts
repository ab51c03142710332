/**
 * Service Locator
 *
 * The dispatcher only ever asks for a service by token. Services are
 * registered by modules during setup, either as instances or lazy factories.
 */

import { ConfigurationError, ServiceNotFoundError } from '../errors.ts';

export type ServiceClass<T> = new (...args: never[]) => T;

/**
 * Typed key for services that are not class instances
 *
 * @example
 * ```typescript
 * const DB_URL = new ServiceKey<string>('dbUrl');
 * services.register(DB_URL, 'postgres://localhost/test');
 * ```
 */
export class ServiceKey<T> {
  declare readonly __service: T;

  constructor(readonly name: string) {}

  toString(): string {
    return `ServiceKey(${this.name})`;
  }
}

export type ServiceToken<T> = ServiceClass<T> | ServiceKey<T>;

/**
 * Opaque lookup used by parameter providers and processors
 */
export interface ServiceLocator {
  resolve<T>(token: ServiceToken<T>): T;
  has(token: ServiceToken<unknown>): boolean;
}

export type ServiceFactory<T> = (locator: ServiceLocator) => T;

/**
 * A function that registers a group of services
 */
export type ServiceModule = (services: ServiceRegistry) => void;

function describeToken(token: ServiceToken<unknown>): string {
  return token instanceof ServiceKey ? token.toString() : `class ${token.name}`;
}

export function isServiceToken(value: unknown): value is ServiceToken<unknown> {
  return value instanceof ServiceKey || typeof value === 'function';
}

/**
 * In-memory service registry
 */
export class ServiceRegistry implements ServiceLocator {
  private instances = new Map<ServiceToken<unknown>, unknown>();
  private factories = new Map<ServiceToken<unknown>, ServiceFactory<unknown>>();

  /**
   * Register a ready instance
   */
  register<T>(token: ServiceToken<T>, instance: T): this {
    this.assertFree(token);
    this.instances.set(token, instance);
    return this;
  }

  /**
   * Register a factory, called once on first resolve
   */
  factory<T>(token: ServiceToken<T>, factory: ServiceFactory<T>): this {
    this.assertFree(token);
    this.factories.set(token, factory);
    return this;
  }

  has(token: ServiceToken<unknown>): boolean {
    return this.instances.has(token) || this.factories.has(token);
  }

  resolve<T>(token: ServiceToken<T>): T {
    let value: unknown;
    if (this.instances.has(token)) {
      value = this.instances.get(token);
    } else {
      const factory = this.factories.get(token);
      if (!factory) {
        throw new ServiceNotFoundError(describeToken(token));
      }
      value = factory(this);
      this.factories.delete(token);
      this.instances.set(token, value);
    }

    if (token instanceof ServiceKey) {
      return value as T;
    }
    if (value instanceof token) {
      return value;
    }
    throw new ConfigurationError(`Service registered for ${describeToken(token)} is not an instance of it`);
  }

  clear(): void {
    this.instances.clear();
    this.factories.clear();
  }

  private assertFree(token: ServiceToken<unknown>): void {
    if (this.has(token)) {
      throw new ConfigurationError(`Service already registered for ${describeToken(token)}`);
    }
  }
}
