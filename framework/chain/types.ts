/**
 * Chain Types
 */

/**
 * Code scheduled by `next` to run after every deeper element has completed
 */
export type Continuation = () => unknown;

export type ElementState = 'pending' | 'running' | 'suspended' | 'completed';

export type ChainStatus = 'running' | 'interrupted' | 'finished';

/**
 * Arguments of an `interrupt` call
 */
export interface Interruption {
  statusCode?: number;
  value?: unknown;
  contentType?: string;
}

/**
 * Control surface handed to every chain element
 */
export interface Chain {
  /**
   * Hand control to the next element. The returned promise settles once every
   * deeper element and the continuation have completed.
   */
  next(continuation?: Continuation): Promise<void>;

  /**
   * Stop the chain. A status of 400 or above is routed to the error handlers;
   * a value becomes the final response and cannot be replaced afterwards.
   */
  interrupt(statusCode?: number, value?: unknown, contentType?: string): void;

  readonly interrupted: boolean;

  /**
   * The failure recorded for this request, if any
   */
  readonly error: unknown;
}
