/**
 * Dispatch Errors
 *
 * Typed failures raised while configuring the registry or processing a request.
 * Everything thrown inside a chain is converted into an error-router invocation;
 * none of these reach the transport.
 */

/**
 * Base class for every Switchyard error
 */
export class SwitchyardError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SwitchyardError';
  }
}

/**
 * Invalid registry or template configuration. Raised at setup time.
 */
export class ConfigurationError extends SwitchyardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Intentional abort carrying its own status code.
 *
 * @example
 * ```typescript
 * throw new ExpectedAbort(404, 'user not found');
 * ```
 */
export class ExpectedAbort extends SwitchyardError {
  readonly statusCode: number;

  constructor(statusCode: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExpectedAbort';
    this.statusCode = statusCode;
  }
}

/**
 * A handler parameter could not be produced by its provider
 */
export class ParameterResolutionError extends ExpectedAbort {
  readonly handlerName: string;
  readonly paramName: string;

  constructor(
    handlerName: string,
    paramName: string,
    reason: string,
    options?: { statusCode?: number; cause?: unknown }
  ) {
    super(
      options?.statusCode ?? 400,
      `Failed to resolve parameter "${paramName}" of handler "${handlerName}": ${reason}`,
      { cause: options?.cause }
    );
    this.name = 'ParameterResolutionError';
    this.handlerName = handlerName;
    this.paramName = paramName;
  }
}

/**
 * Misuse of the chain API, e.g. calling next() twice
 */
export class ChainError extends SwitchyardError {
  constructor(message: string) {
    super(message);
    this.name = 'ChainError';
  }
}

/**
 * A chain element neither advanced nor interrupted before the caller's deadline
 */
export class ChainStallError extends SwitchyardError {
  readonly elementName: string;

  constructor(elementName: string) {
    super(`Chain did not advance: "${elementName}" never called next() or interrupt()`);
    this.name = 'ChainStallError';
    this.elementName = elementName;
  }
}

/**
 * The writer could not turn a final value into bytes
 */
export class SerializationError extends SwitchyardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SerializationError';
  }
}

/**
 * Ambient request state was read outside of a dispatch
 */
export class ContextError extends SwitchyardError {
  constructor(message = 'No request is being dispatched in the current execution context') {
    super(message);
    this.name = 'ContextError';
  }
}

export class ServiceNotFoundError extends SwitchyardError {
  constructor(token: string) {
    super(`No service registered for ${token}`);
    this.name = 'ServiceNotFoundError';
  }
}

/**
 * Handler return value that replaces the provisional status code.
 * The wrapped body still goes through the response processors.
 */
export class ErrorResponse {
  constructor(
    readonly statusCode: number,
    readonly body: unknown
  ) {}
}

/**
 * Status code an error should be routed to
 */
export function statusOf(error: unknown): number {
  return error instanceof ExpectedAbort ? error.statusCode : 500;
}
