/**
 * Error Router
 *
 * Turns a status code (and the failure behind it, if any) into a response.
 * A registered handler for the exact status wins, then the default handler,
 * then the built-in page. Custom handlers run like any other element: their
 * parameters are resolved and their value goes through the response
 * pipeline. When a custom handler fails, the built-in page is written
 * instead; error handling never recurses.
 */

import type { RequestContext } from '../chain/context.ts';
import { SingleElementChain } from '../chain/single.ts';
import { ExpectedAbort } from '../errors.ts';
import { ResponseBuilder } from '../http/response.ts';
import type { ParameterResolver } from '../params/resolver.ts';
import type { ErrorHandlerEntry } from '../registry/entries.ts';
import type { Registry } from '../registry/registry.ts';
import { renderErrorPage } from './error_page.ts';
import type { ResponsePipeline } from './pipeline.ts';

export interface ErrorRouterOptions {
  appName?: string;
  showStackTrace?: boolean;
}

export class ErrorRouter {
  private appName: string;
  private showStackTrace: boolean;

  constructor(
    private registry: Registry,
    private resolver: ParameterResolver,
    private pipeline: ResponsePipeline,
    options: ErrorRouterOptions = {}
  ) {
    this.appName = options.appName ?? 'Switchyard';
    this.showStackTrace = options.showStackTrace ?? true;
  }

  /**
   * Produce the response for a status. Without a context only the built-in
   * handling is available.
   */
  async route(
    statusCode: number,
    resourcePath: string,
    error?: unknown,
    context?: RequestContext
  ): Promise<Response> {
    const entry = this.registry.errorHandlerFor(statusCode);
    if (!entry || !context) {
      return this.builtin(statusCode, resourcePath, error);
    }

    try {
      return await this.invoke(entry, statusCode, resourcePath, context);
    } catch (failure) {
      context.logger.error(`Error handler "${entry.name}" failed`, failure, { status: statusCode });
      return this.page(statusCode, resourcePath, error);
    }
  }

  /**
   * Built-in handling: expected aborts as plain text, everything else as the
   * diagnostic page
   */
  builtin(statusCode: number, resourcePath: string, error?: unknown): Response {
    if (error instanceof ExpectedAbort) {
      return new ResponseBuilder({ status: statusCode }).text(error.message);
    }
    return this.page(statusCode, resourcePath, error);
  }

  page(statusCode: number, resourcePath: string, error?: unknown): Response {
    return new ResponseBuilder({ status: statusCode }).html(
      renderErrorPage({
        appName: this.appName,
        statusCode,
        resourcePath,
        error,
        showStackTrace: this.showStackTrace,
      })
    );
  }

  private async invoke(
    entry: ErrorHandlerEntry,
    statusCode: number,
    resourcePath: string,
    context: RequestContext
  ): Promise<Response> {
    const single = new SingleElementChain(context.error);
    const previous = context.chain;
    context.chain = single;

    try {
      const params = await this.resolver.resolveAll(entry, context);
      let value = await entry.handler(params, {
        request: context.request,
        chain: single,
        services: context.services,
        handlerName: entry.name,
      });

      let status = statusCode;
      let contentType: string | undefined;
      const interruption = single.interruption;
      if (interruption) {
        if (interruption.statusCode !== undefined && interruption.statusCode >= 400) {
          return this.page(interruption.statusCode, resourcePath, context.error);
        }
        value = interruption.value;
        status = interruption.statusCode ?? statusCode;
        contentType = interruption.contentType;
      }

      return await this.pipeline.respond(
        entry,
        value,
        { statusCode: status, contentType },
        context.services
      );
    } finally {
      context.chain = previous;
    }
  }
}
