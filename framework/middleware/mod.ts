/**
 * Middleware Layer
 *
 * Outer middleware wrapping the whole interceptor chain (onion model).
 */

export { conditional, forMethods, forPath, MiddlewarePipeline } from './pipeline.ts';
