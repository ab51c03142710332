/**
 * Event Emitter
 *
 * Typed lifecycle hooks for plugins and the application.
 */

import { getLogger } from '../telemetry/logger.ts';

export type EventHandler<T> = (data: T) => void | Promise<void>;

export type EventMap = Record<string, unknown>;

/**
 * Events emitted by the application
 */
export type DispatchEvents = {
  'app:setup': { routes: number; plugins: string[] };
  'app:teardown': { reason: string };
  'request:start': { requestId: string; method: string; path: string };
  'request:end': {
    requestId: string;
    method: string;
    path: string;
    status: number;
    duration: number;
  };
  'request:error': { requestId: string; status: number; error: unknown };
};

export const Events = {
  APP_SETUP: 'app:setup',
  APP_TEARDOWN: 'app:teardown',
  REQUEST_START: 'request:start',
  REQUEST_END: 'request:end',
  REQUEST_ERROR: 'request:error',
} as const;

type HandlerTable<E extends EventMap> = { [K in keyof E]?: Set<EventHandler<E[K]>> };

/**
 * Event emitter for lifecycle hooks
 */
export class EventEmitter<E extends EventMap = DispatchEvents> {
  private handlers: HandlerTable<E> = {};

  /**
   * Register an event handler
   */
  on<K extends keyof E>(event: K, handler: EventHandler<E[K]>): this {
    let handlers = this.handlers[event];
    if (!handlers) {
      handlers = new Set();
      this.handlers[event] = handlers;
    }
    handlers.add(handler);
    return this;
  }

  /**
   * Register a one-time event handler
   */
  once<K extends keyof E>(event: K, handler: EventHandler<E[K]>): this {
    const wrapper: EventHandler<E[K]> = async (data) => {
      this.off(event, wrapper);
      await handler(data);
    };
    return this.on(event, wrapper);
  }

  off<K extends keyof E>(event: K, handler: EventHandler<E[K]>): this {
    this.handlers[event]?.delete(handler);
    return this;
  }

  removeAllListeners(event?: keyof E): this {
    if (event !== undefined) {
      delete this.handlers[event];
    } else {
      this.handlers = {};
    }
    return this;
  }

  /**
   * Emit an event, awaiting every handler in registration order
   */
  async emit<K extends keyof E>(event: K, data: E[K]): Promise<void> {
    const handlers = this.handlers[event];
    if (!handlers) return;

    for (const handler of [...handlers]) {
      await handler(data);
    }
  }

  /**
   * Emit an event without waiting. Handler failures, thrown or rejected, are
   * logged and never reach the emitter.
   */
  emitSync<K extends keyof E>(event: K, data: E[K]): void {
    const handlers = this.handlers[event];
    if (!handlers) return;

    const report = (error: unknown) => {
      getLogger().error(`Event handler for "${String(event)}" failed`, error);
    };

    for (const handler of [...handlers]) {
      try {
        const result = handler(data);
        if (result instanceof Promise) {
          result.catch(report);
        }
      } catch (error) {
        report(error);
      }
    }
  }

  listenerCount(event: keyof E): number {
    return this.handlers[event]?.size ?? 0;
  }
}
