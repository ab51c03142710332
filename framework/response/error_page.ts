/**
 * Diagnostic Error Page
 *
 * The built-in page written when no custom error handler exists for a status.
 */

const HTML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

/**
 * Escape HTML special characters
 */
export function escapeHtml(str: string): string {
  return str.replace(/[&<>"']/g, (char) => HTML_ENTITIES[char] ?? char);
}

export const STATUS_PHRASES: Readonly<Record<number, string>> = {
  400: 'BAD REQUEST',
  401: 'UNAUTHORIZED',
  403: 'FORBIDDEN',
  404: 'NOT FOUND',
  405: 'METHOD NOT ALLOWED',
  500: 'INTERNAL SERVER ERROR',
};

export interface ErrorPageOptions {
  appName: string;
  statusCode: number;
  resourcePath: string;
  error?: unknown;
  showStackTrace?: boolean;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message ? `${error.name}: ${error.message}` : error.name;
  }
  return String(error);
}

/**
 * Render the page. Only the status line and resource path are guaranteed;
 * the error block appears when an error is given, with its stack trace unless
 * `showStackTrace` is false.
 */
export function renderErrorPage(options: ErrorPageOptions): string {
  const { appName, statusCode, resourcePath, error, showStackTrace = true } = options;
  const phrase = STATUS_PHRASES[statusCode];
  const heading = phrase ? `${statusCode} - ${phrase}` : String(statusCode);
  const title = `${appName} - ${phrase ?? statusCode}`;

  let info = '';
  if (error !== undefined && error !== null) {
    let text = describeError(error);
    if (showStackTrace && error instanceof Error && error.stack) {
      text += `\n\n${error.stack}`;
    }
    info = `\n    <pre class="info">${escapeHtml(text)}</pre>`;
  }

  return `<!DOCTYPE html>
<html>
  <head>
    <meta charset="utf-8">
    <title>${escapeHtml(title)}</title>
    <style>
      body { font-family: sans-serif; margin: 2rem; color: #222; }
      h1 { font-size: 1.5rem; }
      .info { background: #f4f4f4; padding: 1rem; overflow-x: auto; }
    </style>
  </head>
  <body>
    <h1>${heading}</h1>
    <p>Resource: ${escapeHtml(resourcePath)}</p>${info}
  </body>
</html>
`;
}
