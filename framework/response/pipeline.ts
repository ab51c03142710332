/**
 * Response Pipeline
 *
 * Runs a handler's return value through the response processors registered
 * for it, then hands the result to the writer.
 */

import { ErrorResponse, ExpectedAbort } from '../errors.ts';
import { ResponseBuilder } from '../http/response.ts';
import type { HandlerEntry } from '../registry/entries.ts';
import type { Registry } from '../registry/registry.ts';
import type { ServiceLocator } from '../services/locator.ts';
import { Writer, type WriteOptions } from './writer.ts';

export class ResponsePipeline {
  constructor(
    private registry: Registry,
    private writer: Writer = new Writer()
  ) {}

  async respond(
    handler: HandlerEntry,
    value: unknown,
    options: WriteOptions,
    services: ServiceLocator
  ): Promise<Response> {
    // Aborts returned as values skip the processors
    if (value instanceof ExpectedAbort) {
      return new ResponseBuilder({ status: value.statusCode }).text(value.message);
    }

    let statusCode = options.statusCode;
    let current = value;
    if (current instanceof ErrorResponse) {
      statusCode = current.statusCode;
      current = current.body;
    }

    for (const { processor, metadata } of this.registry.processorsFor(handler)) {
      current = await processor(metadata, handler.name, current, services);
    }

    return this.writer.write(current, { statusCode, contentType: options.contentType });
  }
}
