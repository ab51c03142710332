/**
 * Interceptor Chain
 *
 * The executor and the ambient request context.
 */

export { ChainExecutor, type ChainExecutorOptions } from './chain.ts';
export {
  abort,
  chain,
  currentContext,
  findContext,
  getResponse,
  redirect,
  request,
  RequestContext,
  runWithContext,
  setResponse,
  type RequestContextInit,
  type RedirectStatus,
} from './context.ts';
export { SingleElementChain } from './single.ts';
export type {
  Chain,
  ChainStatus,
  Continuation,
  ElementState,
  Interruption,
} from './types.ts';
