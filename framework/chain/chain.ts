/**
 * Chain Executor
 *
 * Runs the interceptors covering a request, in ascending group order, around
 * the matched route. The structure is nested: each interceptor hands control
 * on with `next()`, everything deeper runs, and only then does its
 * continuation run, so "after" phases unwind in reverse order.
 *
 * Interrupts are settled while unwinding, at the level that raised them and
 * before any shallower continuation runs. Failures anywhere in the chain are
 * recorded on the request context and routed to the error handlers; nothing
 * escapes to the caller.
 *
 * The executor enforces no deadline of its own. An element that neither calls
 * `next()` nor `interrupt()` is waited on until the caller's AbortSignal fires,
 * which fails the request with ChainStallError. Elements that did advance are
 * still waited on until their invocation completes.
 */

import { ChainError, ChainStallError, ExpectedAbort, statusOf } from '../errors.ts';
import type { DispatchRequest } from '../http/request.ts';
import type { ParameterResolver } from '../params/resolver.ts';
import type {
  HandlerEntry,
  InterceptorEntry,
  RouteEntry,
} from '../registry/entries.ts';
import type { Registry } from '../registry/registry.ts';
import type { ErrorRouter } from '../response/error_router.ts';
import type { ResponsePipeline } from '../response/pipeline.ts';
import type { RequestContext } from './context.ts';
import type {
  Chain,
  ChainStatus,
  Continuation,
  ElementState,
  Interruption,
} from './types.ts';

class Deferred<T> {
  readonly promise: Promise<T>;
  private _resolve: (value: T) => void = () => {};

  constructor() {
    this.promise = new Promise<T>((resolve) => {
      this._resolve = resolve;
    });
  }

  resolve(value: T): void {
    this._resolve(value);
  }
}

type Outcome = { ok: true; value: unknown } | { ok: false; error: unknown };

type Signal =
  | { type: 'next'; continuation?: Continuation }
  | { type: 'interrupt' }
  | { type: 'returned'; outcome: Outcome }
  | { type: 'stalled' };

type Stalled = { type: 'stalled' };

const STALLED: Stalled = { type: 'stalled' };

interface PendingInterrupt extends Interruption {
  entry?: HandlerEntry;
  settled: boolean;
}

interface ElementRecord {
  name: string;
  state: ElementState;
}

/**
 * Bookkeeping for one run of a chain
 */
class ChainRun {
  status: ChainStatus = 'running';
  pending: PendingInterrupt | null = null;
  readonly elements: ElementRecord[];

  constructor(
    readonly ctx: RequestContext,
    readonly interceptors: readonly InterceptorEntry[],
    readonly target: RouteEntry | null,
    readonly signal: AbortSignal | undefined
  ) {
    this.elements = [
      ...interceptors.map((entry): ElementRecord => ({ name: entry.name, state: 'pending' })),
      { name: target?.name ?? 'unmatched', state: 'pending' },
    ];
  }

  get interrupted(): boolean {
    return this.status === 'interrupted';
  }

  /**
   * Record an interrupt; only the first one counts
   */
  interrupt(interruption: Interruption, entry?: HandlerEntry): boolean {
    if (this.interrupted) {
      return false;
    }
    this.status = 'interrupted';
    this.ctx.interrupted = true;
    this.pending = { ...interruption, entry, settled: false };
    return true;
  }

  /**
   * Record a failure as an implicit interrupt with the failure's status
   */
  fail(error: unknown): void {
    if (this.interrupted) {
      this.ctx.logger.warn('Failure after the chain was interrupted', {
        error: error instanceof Error ? error.message : String(error),
      });
      this.ctx.error ??= error;
      return;
    }
    this.ctx.error = error;
    this.interrupt({ statusCode: statusOf(error) });
  }
}

/**
 * Chain view handed to one element
 */
class ElementChain implements Chain {
  readonly signal = new Deferred<Signal>();
  private released = new Deferred<void>();

  constructor(
    private run: ChainRun,
    private index: number,
    private entry: HandlerEntry,
    private terminal: boolean
  ) {}

  get interrupted(): boolean {
    return this.run.interrupted;
  }

  get error(): unknown {
    return this.run.ctx.error;
  }

  next(continuation?: Continuation): Promise<void> {
    const element = this.run.elements[this.index];
    if (element.state !== 'running') {
      throw new ChainError(
        element.state === 'suspended'
          ? `next() called twice by "${element.name}"`
          : `next() called by "${element.name}" outside of its turn`
      );
    }
    if (this.terminal) {
      // Nothing deeper to run
      return (async () => {
        await continuation?.();
      })();
    }
    if (this.run.interrupted) {
      return Promise.resolve();
    }

    element.state = 'suspended';
    this.signal.resolve({ type: 'next', continuation });
    return this.released.promise;
  }

  interrupt(statusCode?: number, value?: unknown, contentType?: string): void {
    if (this.run.interrupt({ statusCode, value, contentType }, this.entry)) {
      this.signal.resolve({ type: 'interrupt' });
    }
  }

  release(): void {
    this.released.resolve();
  }
}

function withHeader(response: Response, name: string, value: string): Response {
  const headers = new Headers(response.headers);
  headers.set(name, value);
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}

export interface ChainExecutorOptions {
  registry: Registry;
  resolver: ParameterResolver;
  pipeline: ResponsePipeline;
  errorRouter: ErrorRouter;
  /** Called for every failure routed to the error handlers */
  onError?: (context: RequestContext, statusCode: number, error: unknown) => void;
}

/**
 * Drives interceptors and the target for one request at a time
 */
export class ChainExecutor {
  private registry: Registry;
  private resolver: ParameterResolver;
  private pipeline: ResponsePipeline;
  private errorRouter: ErrorRouter;
  private onError?: ChainExecutorOptions['onError'];
  private fallback: RouteEntry | null = null;

  constructor(options: ChainExecutorOptions) {
    this.registry = options.registry;
    this.resolver = options.resolver;
    this.pipeline = options.pipeline;
    this.errorRouter = options.errorRouter;
    this.onError = options.onError;
  }

  /**
   * Target used when no route matches, in place of 404/405
   */
  setFallback(entry: RouteEntry | null): void {
    this.fallback = entry;
  }

  /**
   * Run the chain for a request. Always produces a response.
   */
  async execute(ctx: RequestContext, signal?: AbortSignal): Promise<Response> {
    const { request } = ctx;
    const match = this.registry.match(request.method, request.path);
    if (match) {
      request.setParams(match.params);
      ctx.route = match.route;
    }

    const run = new ChainRun(
      ctx,
      this.registry.interceptorsFor(request.path),
      match?.route ?? this.fallback,
      signal
    );

    await this.runLevel(run, 0);
    if (run.status === 'running') {
      run.status = 'finished';
    }
    ctx.chain = null;

    return ctx.response ?? new Response(null, { status: 200 });
  }

  private runLevel(run: ChainRun, index: number): Promise<void> {
    if (run.interrupted) {
      return Promise.resolve();
    }
    const interceptor = run.interceptors[index];
    return interceptor
      ? this.runInterceptor(run, index, interceptor)
      : this.runTarget(run, index);
  }

  private async runInterceptor(
    run: ChainRun,
    index: number,
    entry: InterceptorEntry
  ): Promise<void> {
    const { ctx } = run;
    const element = run.elements[index];
    const view = new ElementChain(run, index, entry, false);
    element.state = 'running';
    ctx.cursor = index;
    ctx.chain = view;

    const invocation = this.invoke(run, entry, view);
    let signal = await this.waitFor(
      run,
      Promise.race([
        view.signal.promise,
        invocation.then((outcome): Signal => ({ type: 'returned', outcome })),
      ])
    );

    if (signal.type === 'returned') {
      if (!signal.outcome.ok) {
        run.fail(signal.outcome.error);
        await this.settle(run);
        element.state = 'completed';
        return;
      }
      // Returned without advancing; next() or interrupt() may still come later
      signal = await this.waitFor(run, view.signal.promise);
    }

    if (signal.type === 'stalled') {
      run.fail(new ChainStallError(element.name));
      await this.settle(run);
      element.state = 'completed';
      return;
    }

    if (signal.type === 'next') {
      await this.runLevel(run, index + 1);
      await this.settle(run);

      ctx.cursor = index;
      ctx.chain = view;
      if (signal.continuation) {
        try {
          await signal.continuation();
        } catch (error) {
          run.fail(error);
        }
      }
      view.release();
    }

    await this.settle(run);
    await this.finish(run, element, invocation);
  }

  private async runTarget(run: ChainRun, index: number): Promise<void> {
    const { ctx } = run;
    const element = run.elements[index];
    element.state = 'running';
    ctx.cursor = index;

    const target = run.target;
    if (!target) {
      await this.routeUnmatched(run);
      element.state = 'completed';
      return;
    }

    const view = new ElementChain(run, index, target, true);
    ctx.chain = view;

    const outcome = await this.waitFor(run, this.invoke(run, target, view));
    if ('type' in outcome) {
      run.fail(new ChainStallError(element.name));
    } else if (!outcome.ok) {
      run.fail(outcome.error);
    } else if (!run.interrupted) {
      try {
        ctx.setResponse(
          await this.pipeline.respond(
            target,
            outcome.value,
            { statusCode: target.statusCode, contentType: target.contentType },
            ctx.services
          )
        );
        run.status = 'finished';
      } catch (error) {
        run.fail(error);
      }
    }

    await this.settle(run);
    element.state = 'completed';
  }

  private async routeUnmatched(run: ChainRun): Promise<void> {
    const { ctx } = run;
    const allowed = this.registry.allowedMethods(ctx.request.path);
    run.interrupt({ statusCode: allowed.length > 0 ? 405 : 404 });
    await this.settle(run);

    if (allowed.length > 0 && ctx.response && !ctx.responseLocked) {
      ctx.setResponse(withHeader(ctx.response, 'allow', allowed.join(', ')));
    }
  }

  /**
   * Resolve parameters and call the handler. Never rejects.
   */
  private async invoke(run: ChainRun, entry: HandlerEntry, view: Chain): Promise<Outcome> {
    const { ctx } = run;
    try {
      if (entry.kind === 'route') {
        this.checkBodyType(entry, ctx.request);
      }
      const params = await this.resolver.resolveAll(entry, ctx);
      const value = await entry.handler(params, {
        request: ctx.request,
        chain: view,
        services: ctx.services,
        handlerName: entry.name,
      });
      return { ok: true, value };
    } catch (error) {
      return { ok: false, error };
    }
  }

  private checkBodyType(entry: RouteEntry, request: DispatchRequest): void {
    if (!entry.bodyTypes) return;
    const type = request.bodyType;
    if (type === null || !entry.bodyTypes.includes(type)) {
      throw new ExpectedAbort(
        400,
        `Unsupported request body type "${type ?? 'none'}", expected ${entry.bodyTypes.join(' or ')}`
      );
    }
  }

  /**
   * Wait for an element's own invocation to complete, including code that
   * runs after its awaited next(). The deadline only bounds advancing, so an
   * element that already advanced is always waited on to the end.
   */
  private async finish(
    run: ChainRun,
    element: ElementRecord,
    invocation: Promise<Outcome>
  ): Promise<void> {
    const outcome = await invocation;
    if (!outcome.ok) {
      run.fail(outcome.error);
    }
    await this.settle(run);
    element.state = 'completed';
  }

  /**
   * Turn a pending interrupt into the in-progress response
   */
  private async settle(run: ChainRun): Promise<void> {
    const pending = run.pending;
    if (!pending || pending.settled) return;
    pending.settled = true;

    const { ctx } = run;
    const { statusCode, value, contentType, entry } = pending;

    if (statusCode !== undefined && statusCode >= 400) {
      await this.routeError(ctx, statusCode, ctx.error);
      return;
    }

    if (value !== undefined && entry) {
      try {
        ctx.lockResponse(
          await this.pipeline.respond(
            entry,
            value,
            { statusCode: statusCode ?? 200, contentType },
            ctx.services
          )
        );
      } catch (error) {
        ctx.error = error;
        await this.routeError(ctx, statusOf(error), error);
      }
      return;
    }

    if (statusCode !== undefined) {
      ctx.setResponse(new Response(null, { status: statusCode }));
    }
  }

  private async routeError(ctx: RequestContext, statusCode: number, error: unknown): Promise<void> {
    if (error !== undefined) {
      this.onError?.(ctx, statusCode, error);
    }
    ctx.setResponse(await this.errorRouter.route(statusCode, ctx.request.path, error, ctx));
  }

  /**
   * Wait for a promise, or until the caller's deadline fires
   */
  private waitFor<T>(run: ChainRun, promise: Promise<T>): Promise<T | Stalled> {
    const { signal } = run;
    if (!signal) {
      return promise;
    }
    if (signal.aborted) {
      return Promise.resolve(STALLED);
    }

    return new Promise<T | Stalled>((resolve, reject) => {
      const onAbort = () => resolve(STALLED);
      signal.addEventListener('abort', onAbort, { once: true });
      promise.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }
}
