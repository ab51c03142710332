/**
 * One-element chain used to run error handlers
 */

import type { Chain, Continuation, Interruption } from './types.ts';

export class SingleElementChain implements Chain {
  private _interruption: Interruption | null = null;

  constructor(private readonly _error: unknown) {}

  get interrupted(): boolean {
    return this._interruption !== null;
  }

  get error(): unknown {
    return this._error;
  }

  get interruption(): Interruption | null {
    return this._interruption;
  }

  /**
   * There is nothing deeper to run; the continuation runs right away
   */
  async next(continuation?: Continuation): Promise<void> {
    if (continuation && !this.interrupted) {
      await continuation();
    }
  }

  interrupt(statusCode?: number, value?: unknown, contentType?: string): void {
    this._interruption ??= { statusCode, value, contentType };
  }
}
