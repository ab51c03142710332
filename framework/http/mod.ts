/**
 * HTTP Layer
 *
 * Request view, body parsing, response building and the node:http adapter.
 */

export {
  Server,
  toRequest,
  writeResponse,
  type FetchHandler,
  type ListenAddress,
  type ServerOptions,
} from './server.ts';
export { DispatchRequest, type RequestState } from './request.ts';
export { isNullBodyStatus, ResponseBuilder, type ResponseOptions } from './response.ts';
export {
  detectBodyType,
  formDataToRecord,
  parseBody,
  type BodyTypeInfo,
  type FormRecord,
  type FormValue,
} from './body.ts';
export { lookupMimeType, type MimeLookup } from './mime.ts';
export {
  HTTP_METHODS,
  type BodyType,
  type DispatchOptions,
  type HttpMethod,
  type Middleware,
  type Next,
  type SessionData,
  type SessionLoader,
} from './types.ts';
