/**
 * Handler Registry
 */

export { Registry } from './registry.ts';
export {
  HANDLER_KINDS,
  pathMatches,
  type Annotation,
  type BoundProcessor,
  type ErrorHandlerEntry,
  type Handler,
  type HandlerContext,
  type HandlerEntry,
  type HandlerKind,
  type InterceptorEntry,
  type ParameterProvider,
  type ParameterSpec,
  type PathPattern,
  type ProcessorEntry,
  type ProviderEntry,
  type ResponseProcessor,
  type RouteEntry,
  type TargetType,
} from './entries.ts';
