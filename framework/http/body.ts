/**
 * Request Body Parsing
 *
 * Detects the body type from the content-type header and parses the body
 * into a JSON value, a form record, text or raw bytes.
 */

import { ExpectedAbort } from '../errors.ts';
import type { BodyType } from './types.ts';

export type FormValue = Exclude<ReturnType<FormData['get']>, null>;

export type FormRecord = Record<string, FormValue | FormValue[]>;

export interface BodyTypeInfo {
  type: BodyType | null;
  multipart: boolean;
}

/**
 * Map a content-type header to a body type
 */
export function detectBodyType(contentType: string | null): BodyTypeInfo {
  if (!contentType) {
    return { type: null, multipart: false };
  }

  const mediaType = contentType.split(';')[0].trim().toLowerCase();
  const [primary, sub = ''] = mediaType.split('/');

  switch (primary) {
    case 'text':
      return { type: 'text', multipart: false };
    case 'application':
      if (sub === 'json' || sub.endsWith('+json')) {
        return { type: 'json', multipart: false };
      }
      if (sub === 'x-www-form-urlencoded') {
        return { type: 'form', multipart: false };
      }
      return { type: 'binary', multipart: false };
    case 'multipart':
      return { type: sub === 'form-data' ? 'form' : 'binary', multipart: true };
    default:
      return { type: 'binary', multipart: false };
  }
}

/**
 * Convert FormData into a plain record. Repeated keys become arrays.
 */
export function formDataToRecord(form: FormData): FormRecord {
  const record: FormRecord = {};

  form.forEach((value, key) => {
    const existing = record[key];
    if (existing === undefined) {
      record[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      record[key] = [existing, value];
    }
  });

  return record;
}

/**
 * Read and parse the body of a request according to its detected type
 */
export async function parseBody(request: Request, info: BodyTypeInfo): Promise<unknown> {
  if (info.type === null || request.body === null) {
    return null;
  }

  try {
    switch (info.type) {
      case 'json': {
        const text = await request.text();
        return text.trim() === '' ? null : JSON.parse(text);
      }
      case 'form':
        return formDataToRecord(await request.formData());
      case 'text':
        return await request.text();
      case 'binary':
        return new Uint8Array(await request.arrayBuffer());
    }
  } catch (error) {
    throw new ExpectedAbort(400, `Malformed ${info.type} request body`, { cause: error });
  }
}
