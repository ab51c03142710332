/**
 * MIME Lookup
 */

export type MimeLookup = (filename: string) => string | undefined;

const MIME_TYPES: Record<string, string> = {
  html: 'text/html; charset=utf-8',
  htm: 'text/html; charset=utf-8',
  css: 'text/css; charset=utf-8',
  js: 'application/javascript; charset=utf-8',
  mjs: 'application/javascript; charset=utf-8',
  json: 'application/json; charset=utf-8',
  xml: 'application/xml; charset=utf-8',
  txt: 'text/plain; charset=utf-8',
  csv: 'text/csv; charset=utf-8',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  svg: 'image/svg+xml',
  webp: 'image/webp',
  ico: 'image/x-icon',
  woff: 'font/woff',
  woff2: 'font/woff2',
  ttf: 'font/ttf',
  otf: 'font/otf',
  pdf: 'application/pdf',
  zip: 'application/zip',
  wasm: 'application/wasm',
};

/**
 * Content type for a filename, by extension
 */
export const lookupMimeType: MimeLookup = (filename) => {
  const base = filename.split(/[\\/]/).pop() ?? filename;
  const idx = base.lastIndexOf('.');
  if (idx < 0) return undefined;
  return MIME_TYPES[base.slice(idx + 1).toLowerCase()];
};
