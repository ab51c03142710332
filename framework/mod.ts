/**
 * Switchyard
 *
 * Request-dispatch core: route matching, interceptor chains, parameter
 * providers, response processors and error routing.
 *
 * @module switchyard
 */

// Application
export { Application, createApp, type ApplicationOptions } from './app.ts';

// Errors
export {
  ChainError,
  ChainStallError,
  ConfigurationError,
  ContextError,
  ErrorResponse,
  ExpectedAbort,
  ParameterResolutionError,
  SerializationError,
  ServiceNotFoundError,
  statusOf,
  SwitchyardError,
} from './errors.ts';

// HTTP
export {
  DispatchRequest,
  ResponseBuilder,
  Server,
  type BodyType,
  type DispatchOptions,
  type HttpMethod,
  type Middleware,
  type Next,
  type ServerOptions,
  type SessionData,
  type SessionLoader,
} from './http/mod.ts';

// Routing
export { compileTemplate, Matcher, type RouteMatch, type RouteTemplate } from './router/mod.ts';

// Registry
export {
  Registry,
  type Annotation,
  type Handler,
  type HandlerContext,
  type HandlerKind,
  type ParameterProvider,
  type ParameterSpec,
  type PathPattern,
  type ResponseProcessor,
  type TargetType,
} from './registry/mod.ts';

// Parameters
export { BuiltinMarkers, ParameterResolver } from './params/mod.ts';

// Chain & request context
export {
  abort,
  chain,
  ChainExecutor,
  currentContext,
  getResponse,
  redirect,
  request,
  RequestContext,
  setResponse,
  type Chain,
  type Continuation,
} from './chain/mod.ts';

// Responses
export { ErrorRouter, FileBody, ResponsePipeline, Writer } from './response/mod.ts';

// Services
export {
  ServiceKey,
  ServiceRegistry,
  type ServiceLocator,
  type ServiceModule,
  type ServiceToken,
} from './services/mod.ts';

// Middleware
export { conditional, forMethods, forPath, MiddlewarePipeline } from './middleware/mod.ts';

// Plugins & events
export {
  definePlugin,
  EventEmitter,
  Events,
  PluginManager,
  type DispatchEvents,
  type Manager,
  type Plugin,
  type RouteOptions,
} from './plugin/mod.ts';

// Auth
export { authenticateBasic, parseAuthorizationHeader, type Credentials } from './auth/mod.ts';

// Configuration
export { Config, loadConfig, type ConfigOptions } from './config/mod.ts';

// Telemetry
export { createRequestLogger, getLogger, Logger, setLogger, type LogEntry } from './telemetry/mod.ts';
