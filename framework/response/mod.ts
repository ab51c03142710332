/**
 * Response Layer
 *
 * Response processors, the value writer and error routing.
 */

export { ResponsePipeline } from './pipeline.ts';
export {
  classify,
  FileBody,
  Writer,
  type ResponseValue,
  type WriteOptions,
  type WriterOptions,
} from './writer.ts';
export { ErrorRouter, type ErrorRouterOptions } from './error_router.ts';
export { escapeHtml, renderErrorPage, STATUS_PHRASES, type ErrorPageOptions } from './error_page.ts';
