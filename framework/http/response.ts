/**
 * Response Builder
 *
 * Fluent builder for the wire-level Fetch API responses produced by the writer
 * and the error router.
 */

export interface ResponseOptions {
  status?: number;
  headers?: Headers | Record<string, string>;
}

type BuilderBody = string | Uint8Array | Blob | null;

/**
 * Statuses that must not carry a body
 */
const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

export function isNullBodyStatus(status: number): boolean {
  return NULL_BODY_STATUSES.has(status);
}

/**
 * Response builder for Switchyard
 */
export class ResponseBuilder {
  private _status = 200;
  private _headers: Headers = new Headers();
  private _body: BuilderBody = null;

  constructor(options?: ResponseOptions) {
    if (options?.status) {
      this._status = options.status;
    }
    if (options?.headers) {
      new Headers(options.headers).forEach((value, key) => {
        this._headers.set(key, value);
      });
    }
  }

  /**
   * Set the response status code
   */
  status(code: number): this {
    this._status = code;
    return this;
  }

  header(name: string, value: string): this {
    this._headers.set(name, value);
    return this;
  }

  headers(headers: Record<string, string>): this {
    for (const [name, value] of Object.entries(headers)) {
      this._headers.set(name, value);
    }
    return this;
  }

  /**
   * Set the Content-Type header; `undefined` leaves it untouched
   */
  type(contentType: string | undefined): this {
    if (contentType !== undefined) {
      this._headers.set('content-type', contentType);
    }
    return this;
  }

  body(body: BuilderBody): this {
    this._body = body;
    return this;
  }

  text(content: string, contentType = 'text/plain'): Response {
    return this.type(contentType).body(content).build();
  }

  html(content: string): Response {
    return this.type('text/html').body(content).build();
  }

  empty(): Response {
    this._body = null;
    return this.build();
  }

  /**
   * Build the final Response object
   */
  build(): Response {
    const body = isNullBodyStatus(this._status) ? null : this._body;
    return new Response(body, {
      status: this._status,
      headers: this._headers,
    });
  }
}
