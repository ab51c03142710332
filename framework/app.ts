/**
 * Application Class
 *
 * Owns one dispatcher: its registry, services, plugins, middleware and
 * lifecycle. Several applications can live in one process without sharing
 * any state, which keeps tests independent.
 */

import { randomUUID } from 'node:crypto';
import { ChainExecutor } from './chain/chain.ts';
import { RequestContext, runWithContext } from './chain/context.ts';
import { Config, type ConfigOptions } from './config/config.ts';
import { statusOf } from './errors.ts';
import { DispatchRequest } from './http/request.ts';
import { Server, type ListenAddress } from './http/server.ts';
import type {
  DispatchOptions,
  HttpMethod,
  Middleware,
  SessionLoader,
} from './http/types.ts';
import { MiddlewarePipeline } from './middleware/pipeline.ts';
import { ParameterResolver } from './params/resolver.ts';
import { registerBuiltinProviders } from './params/providers.ts';
import { EventEmitter, type DispatchEvents, type EventHandler } from './plugin/events.ts';
import {
  PluginManager,
  type HandlerOptions,
  type InterceptorOptions,
  type Manager,
  type Plugin,
  type RouteOptions,
} from './plugin/plugin.ts';
import type {
  Handler,
  HandlerKind,
  ParameterProvider,
  PathPattern,
  ResponseProcessor,
  RouteEntry,
} from './registry/entries.ts';
import { Registry } from './registry/registry.ts';
import { ErrorRouter } from './response/error_router.ts';
import { ResponsePipeline } from './response/pipeline.ts';
import { Writer, type WriterOptions } from './response/writer.ts';
import { compileTemplate } from './router/template.ts';
import { ServiceRegistry, type ServiceModule } from './services/locator.ts';
import { createRequestLogger, Logger } from './telemetry/logger.ts';
import {
  getActiveSpan,
  recordSpanException,
  setRouteAttribute,
  withServerSpan,
} from './telemetry/otel.ts';

export interface ApplicationOptions {
  config?: Config | ConfigOptions;
  logger?: Logger;
  /** Loads the session attached to each request */
  sessionLoader?: SessionLoader;
  writer?: WriterOptions;
}

/**
 * Main Application class
 */
export class Application implements Manager {
  private config: Config;
  private logger: Logger;
  private registry = new Registry();
  private services = new ServiceRegistry();
  private modules: ServiceModule[] = [];
  private plugins: PluginManager;
  private events = new EventEmitter<DispatchEvents>();
  private middleware = new MiddlewarePipeline();
  private sessionLoader?: SessionLoader;
  private errorRouter: ErrorRouter;
  private executor: ChainExecutor;
  private fallback: RouteEntry | null = null;
  private server: Server | null = null;

  constructor(options: ApplicationOptions = {}) {
    this.config =
      options.config instanceof Config ? options.config : new Config(options.config);
    this.logger =
      options.logger ??
      new Logger({
        level: this.config.logLevel,
        format: this.config.logFormat,
        context: { app: this.config.appName },
      });
    this.plugins = new PluginManager(this.logger);
    this.sessionLoader = options.sessionLoader;

    const resolver = new ParameterResolver(this.registry);
    const pipeline = new ResponsePipeline(this.registry, new Writer(options.writer));
    this.errorRouter = new ErrorRouter(this.registry, resolver, pipeline, {
      appName: this.config.appName,
      showStackTrace: this.config.showStackTrace,
    });
    this.executor = new ChainExecutor({
      registry: this.registry,
      resolver,
      pipeline,
      errorRouter: this.errorRouter,
      onError: (ctx, statusCode, error) => this.reportError(ctx, statusCode, error),
    });

    registerBuiltinProviders(this.registry);
  }

  // ============================================================================
  // Manager contract
  // ============================================================================

  addRoute(method: HttpMethod, path: string, handler: Handler, options: RouteOptions = {}): void {
    this.registry.register({
      kind: 'route',
      name: options.name ?? `${method} ${path}`,
      method,
      template: compileTemplate(path),
      handler,
      params: options.params ?? [],
      annotations: options.annotations ?? [],
      bodyTypes: options.bodyTypes,
      statusCode: options.statusCode ?? 200,
      contentType: options.contentType,
    });
  }

  addInterceptor(pattern: PathPattern, handler: Handler, options: InterceptorOptions = {}): void {
    this.registry.register({
      kind: 'interceptor',
      name: options.name ?? (handler.name || `interceptor[${this.registry.interceptorCount}]`),
      pattern,
      group: options.group ?? 0,
      handler,
      params: options.params ?? [],
      annotations: options.annotations ?? [],
    });
  }

  addErrorHandler(
    statusCode: number | 'default',
    handler: Handler,
    options: HandlerOptions = {}
  ): void {
    this.registry.register({
      kind: 'error',
      name: options.name ?? `error:${statusCode}`,
      statusCode,
      handler,
      params: options.params ?? [],
      annotations: options.annotations ?? [],
    });
  }

  addParameterProvider(
    marker: string,
    provider: ParameterProvider,
    kinds: readonly HandlerKind[] = ['route']
  ): void {
    this.registry.addProvider(marker, provider, kinds);
  }

  addResponseProcessor(processor: ResponseProcessor, marker?: string): void {
    this.registry.addProcessor(processor, marker);
  }

  // ============================================================================
  // Registration helpers
  // ============================================================================

  route(method: HttpMethod, path: string, handler: Handler, options?: RouteOptions): this {
    this.addRoute(method, path, handler, options);
    return this;
  }

  get(path: string, handler: Handler, options?: RouteOptions): this {
    return this.route('GET', path, handler, options);
  }

  post(path: string, handler: Handler, options?: RouteOptions): this {
    return this.route('POST', path, handler, options);
  }

  put(path: string, handler: Handler, options?: RouteOptions): this {
    return this.route('PUT', path, handler, options);
  }

  patch(path: string, handler: Handler, options?: RouteOptions): this {
    return this.route('PATCH', path, handler, options);
  }

  delete(path: string, handler: Handler, options?: RouteOptions): this {
    return this.route('DELETE', path, handler, options);
  }

  interceptor(pattern: PathPattern, handler: Handler, options?: InterceptorOptions): this {
    this.addInterceptor(pattern, handler, options);
    return this;
  }

  errorHandler(statusCode: number | 'default', handler: Handler, options?: HandlerOptions): this {
    this.addErrorHandler(statusCode, handler, options);
    return this;
  }

  /**
   * Add outer middleware, run around the interceptor chain
   */
  use(middleware: Middleware): this {
    this.middleware.use(middleware);
    return this;
  }

  /**
   * Register services; modules run during setUp
   */
  addModule(module: ServiceModule): this {
    this.modules.push(module);
    return this;
  }

  addPlugin(plugin: Plugin): this {
    this.plugins.register(plugin);
    return this;
  }

  /**
   * Handler used when no route matches, instead of 404/405
   */
  setFallbackHandler(handler: Handler, options: HandlerOptions = {}): this {
    this.fallback = {
      kind: 'route',
      name: options.name ?? 'fallback',
      method: 'GET',
      template: compileTemplate('/'),
      handler,
      params: options.params ?? [],
      annotations: options.annotations ?? [],
      statusCode: 200,
    };
    return this;
  }

  on<K extends keyof DispatchEvents>(event: K, handler: EventHandler<DispatchEvents[K]>): this {
    this.events.on(event, handler);
    return this;
  }

  getConfig(): Config {
    return this.config;
  }

  getLogger(): Logger {
    return this.logger;
  }

  getRegistry(): Registry {
    return this.registry;
  }

  getServices(): ServiceRegistry {
    return this.services;
  }

  get isSetUp(): boolean {
    return this.registry.isSealed;
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Run service modules, install plugins and seal the registry. A failure
   * leaves the application unable to serve.
   */
  async setUp(): Promise<void> {
    if (this.registry.isSealed) return;

    for (const module of this.modules) {
      module(this.services);
    }
    await this.plugins.installAll(this);

    if (this.fallback) {
      this.registry.validate(this.fallback);
    }
    this.registry.seal();
    this.executor.setFallback(this.fallback);

    const routes = this.registry.routes().length;
    const plugins = this.plugins.getInstalledPlugins();
    this.logger.info('Application set up', {
      routes,
      interceptors: this.registry.interceptorCount,
      plugins,
    });
    await this.events.emit('app:setup', { routes, plugins });
  }

  /**
   * Remove every registration, services included
   */
  async tearDown(reason = 'teardown'): Promise<void> {
    this.registry.clear();
    registerBuiltinProviders(this.registry);
    this.services.clear();
    this.plugins.reset();
    this.executor.setFallback(null);
    this.fallback = null;

    this.logger.info('Application torn down', { reason });
    await this.events.emit('app:teardown', { reason });
  }

  /**
   * Dispatch one request. Always resolves to exactly one response; an
   * internal failure becomes a bodiless 500.
   */
  async dispatch(raw: Request, options: DispatchOptions = {}): Promise<Response> {
    const startTime = performance.now();
    const requestId = randomUUID();
    const method = raw.method;
    const path = new URL(raw.url).pathname;
    const logger = createRequestLogger(this.logger, {
      requestId,
      method,
      path,
      userAgent: raw.headers.get('user-agent') ?? undefined,
    });

    if (!this.registry.isSealed) {
      logger.error('Request received before setUp() completed');
      return new Response(null, { status: 500 });
    }

    const response = await withServerSpan(method, path, async (span) => {
      try {
        const session = this.sessionLoader ? await this.sessionLoader(raw) : null;
        const request = new DispatchRequest(raw, { session, startTime });
        const ctx = new RequestContext({ id: requestId, request, services: this.services, logger });

        return await runWithContext(ctx, async () => {
          await this.events.emit('request:start', { requestId, method, path });
          const result = await this.runMiddleware(ctx, options.signal);
          if (ctx.route) {
            setRouteAttribute(span, method, ctx.route.template.source);
          }
          return result;
        });
      } catch (error) {
        logger.error('Dispatch failed', error);
        recordSpanException(span, error);
        return new Response(null, { status: 500 });
      }
    });

    const duration = performance.now() - startTime;
    logger.debug('Request completed', { status: response.status, duration });
    try {
      await this.events.emit('request:end', {
        requestId,
        method,
        path,
        status: response.status,
        duration,
      });
    } catch (error) {
      logger.error('request:end handler failed', error);
    }

    return response;
  }

  /**
   * Set up (if needed) and start the HTTP server
   */
  async listen(): Promise<ListenAddress> {
    if (this.server) {
      throw new Error('Application is already listening');
    }
    await this.setUp();

    const server = new Server((request, options) => this.dispatch(request, options), {
      port: this.config.port,
      hostname: this.config.host,
      requestTimeout: this.config.requestTimeout,
      logger: this.logger,
      onListen: ({ hostname, port }) => {
        this.logger.info(`Server listening on http://${hostname}:${port}`);
      },
    });
    this.server = server;
    return await server.listen();
  }

  async close(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (server) {
      await server.close();
      this.logger.info('Server closed');
    }
  }

  private async runMiddleware(ctx: RequestContext, signal?: AbortSignal): Promise<Response> {
    try {
      return await this.middleware.execute(ctx.request, () => this.executor.execute(ctx, signal));
    } catch (error) {
      const statusCode = statusOf(error);
      ctx.error = error;
      this.reportError(ctx, statusCode, error);
      return await this.errorRouter.route(statusCode, ctx.request.path, error, ctx);
    }
  }

  private reportError(ctx: RequestContext, statusCode: number, error: unknown): void {
    if (statusCode >= 500) {
      ctx.logger.error('Request failed', error, { status: statusCode });
    } else {
      ctx.logger.debug('Request aborted', {
        status: statusCode,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    const span = getActiveSpan();
    if (span) {
      recordSpanException(span, error);
    }
    this.events.emitSync('request:error', { requestId: ctx.id, status: statusCode, error });
  }
}

/**
 * Create a new application instance
 */
export function createApp(options?: ApplicationOptions): Application {
  return new Application(options);
}
