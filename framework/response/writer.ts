/**
 * Response Writer
 *
 * Converts a handler's final value into a wire-level response. Values are
 * first classified into a closed set of variants, then each variant is
 * written by its own rule.
 */

import { openAsBlob } from 'node:fs';
import { ExpectedAbort, SerializationError } from '../errors.ts';
import { lookupMimeType, type MimeLookup } from '../http/mime.ts';
import { ResponseBuilder } from '../http/response.ts';

/**
 * A file on disk to be streamed as the response body
 */
export class FileBody {
  constructor(
    readonly path: string,
    /** Name used for the content-type lookup; defaults to the path */
    readonly name?: string
  ) {}
}

export type ResponseValue =
  | { kind: 'none' }
  | { kind: 'raw'; response: Response }
  | { kind: 'abort'; error: ExpectedAbort }
  | { kind: 'mapping'; value: Record<string, unknown> | Map<unknown, unknown> }
  | { kind: 'sequence'; value: readonly unknown[] }
  | { kind: 'file'; file: FileBody }
  | { kind: 'binary'; bytes: Uint8Array }
  | { kind: 'text'; text: string };

export interface WriteOptions {
  statusCode: number;
  /** Explicit content-type set upstream; overrides inference */
  contentType?: string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Classify a value into its response variant
 */
export function classify(value: unknown): ResponseValue {
  if (value === null || value === undefined) return { kind: 'none' };
  if (value instanceof Response) return { kind: 'raw', response: value };
  if (value instanceof ExpectedAbort) return { kind: 'abort', error: value };
  if (value instanceof FileBody) return { kind: 'file', file: value };
  if (value instanceof Uint8Array) return { kind: 'binary', bytes: value };
  if (value instanceof ArrayBuffer) return { kind: 'binary', bytes: new Uint8Array(value) };
  if (Array.isArray(value)) return { kind: 'sequence', value };
  if (value instanceof Map || isPlainObject(value)) return { kind: 'mapping', value };
  return { kind: 'text', text: String(value) };
}

// Nested Maps serialize as objects
function replacer(_key: string, value: unknown): unknown {
  return value instanceof Map ? Object.fromEntries(value) : value;
}

function toJson(value: unknown): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(value, replacer);
  } catch (error) {
    throw new SerializationError(
      `Cannot serialize response value: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
  return json ?? 'null';
}

export interface WriterOptions {
  lookup?: MimeLookup;
}

/**
 * Writes final values as Fetch API responses
 */
export class Writer {
  private lookup: MimeLookup;

  constructor(options: WriterOptions = {}) {
    this.lookup = options.lookup ?? lookupMimeType;
  }

  async write(value: unknown, options: WriteOptions): Promise<Response> {
    const { statusCode, contentType } = options;
    const variant = classify(value);

    switch (variant.kind) {
      case 'none':
        return new ResponseBuilder({ status: statusCode }).type(contentType).empty();
      case 'raw':
        return variant.response;
      case 'abort':
        return new ResponseBuilder({ status: variant.error.statusCode }).text(variant.error.message);
      case 'mapping':
      case 'sequence':
        return new ResponseBuilder({ status: statusCode })
          .type(contentType ?? 'application/json')
          .body(toJson(variant.value))
          .build();
      case 'file': {
        const { file } = variant;
        const type =
          contentType ?? this.lookup(file.name ?? file.path) ?? 'application/octet-stream';
        const blob = await openAsBlob(file.path);
        return new ResponseBuilder({ status: statusCode }).type(type).body(blob).build();
      }
      case 'binary':
        return new ResponseBuilder({ status: statusCode })
          .type(contentType ?? 'application/octet-stream')
          .body(variant.bytes)
          .build();
      case 'text':
        return new ResponseBuilder({ status: statusCode }).text(variant.text, contentType);
    }
  }
}
