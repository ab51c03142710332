/**
 * Dispatch Request
 *
 * Snapshot of the incoming request shared by interceptors, providers and
 * handlers: method, URL, headers, query, session, attributes and a lazily
 * parsed body.
 */

import { detectBodyType, parseBody, type BodyTypeInfo } from './body.ts';
import type { BodyType, SessionData } from './types.ts';

export interface RequestState {
  params: Record<string, string>;
  attributes: Map<string, unknown>;
  session: SessionData | null;
  startTime: number;
}

/**
 * Request view for Switchyard handlers
 */
export class DispatchRequest {
  private _request: Request;
  private _url: URL;
  private _state: RequestState;
  private _bodyInfo: BodyTypeInfo;
  private _bodyParsed: Promise<unknown> | null = null;

  constructor(request: Request, state?: Partial<RequestState>) {
    this._request = request;
    this._url = new URL(request.url);
    this._state = {
      params: state?.params ?? {},
      attributes: state?.attributes ?? new Map(),
      session: state?.session ?? null,
      startTime: state?.startTime ?? performance.now(),
    };
    this._bodyInfo = detectBodyType(request.headers.get('content-type'));
  }

  /**
   * The underlying Fetch API request
   */
  get raw(): Request {
    return this._request;
  }

  get method(): string {
    return this._request.method;
  }

  /**
   * Full requested URL
   */
  get url(): string {
    return this._request.url;
  }

  get requestedUri(): URL {
    return this._url;
  }

  /**
   * URL path (without query string)
   */
  get path(): string {
    return this._url.pathname;
  }

  get query(): URLSearchParams {
    return this._url.searchParams;
  }

  /**
   * Query parameters as a plain record (first value wins)
   */
  get queryParams(): Record<string, string> {
    const params: Record<string, string> = {};
    for (const [key, value] of this._url.searchParams) {
      if (!(key in params)) {
        params[key] = value;
      }
    }
    return params;
  }

  /**
   * Path variables extracted by the matcher
   */
  get params(): Record<string, string> {
    return this._state.params;
  }

  get headers(): Headers {
    return this._request.headers;
  }

  header(name: string): string | null {
    return this._request.headers.get(name);
  }

  /**
   * Objects shared between interceptors and routes
   */
  get attributes(): Map<string, unknown> {
    return this._state.attributes;
  }

  get session(): SessionData | null {
    return this._state.session;
  }

  get startTime(): number {
    return this._state.startTime;
  }

  get contentType(): string | null {
    return this.header('content-type');
  }

  get bodyType(): BodyType | null {
    return this._bodyInfo.type;
  }

  get isMultipart(): boolean {
    return this._bodyInfo.multipart;
  }

  get cookies(): Map<string, string> {
    const cookieHeader = this.header('cookie') ?? '';
    const cookies = new Map<string, string>();

    for (const cookie of cookieHeader.split(';')) {
      const [name, ...rest] = cookie.split('=');
      if (name.trim()) {
        cookies.set(name.trim(), rest.join('=').trim());
      }
    }

    return cookies;
  }

  cookie(name: string): string | undefined {
    return this.cookies.get(name);
  }

  /**
   * Parsed body. Read at most once; later calls share the first result.
   */
  body(): Promise<unknown> {
    if (!this._bodyParsed) {
      this._bodyParsed = parseBody(this._request, this._bodyInfo);
    }
    return this._bodyParsed;
  }

  /**
   * Set path variables (used by the dispatcher after matching)
   */
  setParams(params: Record<string, string>): void {
    this._state.params = params;
  }

  setSession(session: SessionData | null): void {
    this._state.session = session;
  }
}
