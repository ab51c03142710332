/**
 * Structured Logging
 *
 * JSON-structured logging with levels and context. Every dispatch gets a child
 * logger carrying its request id, method and path.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  context?: Record<string, unknown>;
  output?: (entry: LogEntry) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVELS;
}

/**
 * Structured logger
 */
export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private context: Record<string, unknown>;
  private output: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.output = options.output ?? this.defaultOutput.bind(this);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  /**
   * Log at error level. Non-Error values thrown by user code are recorded by
   * their string form.
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.context, ...context },
      output: this.output,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };

    if (error instanceof Error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    } else if (error !== undefined) {
      entry.error = { name: typeof error, message: String(error) };
    }

    this.output(entry);
  }

  private defaultOutput(entry: LogEntry): void {
    const write = entry.level === 'warn' || entry.level === 'error' ? console.error : console.log;

    if (this.format === 'json') {
      write(JSON.stringify(entry));
      return;
    }

    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m',
      info: '\x1b[32m',
      warn: '\x1b[33m',
      error: '\x1b[31m',
    };
    const reset = '\x1b[0m';
    const dim = '\x1b[2m';

    const timestamp = dim + entry.timestamp + reset;
    const level = colors[entry.level] + entry.level.toUpperCase().padEnd(5) + reset;

    let line = `${timestamp} ${level} ${entry.message}`;
    if (entry.context && Object.keys(entry.context).length > 0) {
      line += ` ${dim}${JSON.stringify(entry.context)}${reset}`;
    }
    write(line);

    if (entry.error?.stack) {
      write(dim + entry.error.stack + reset);
    }
  }
}

/**
 * Fields attached to every entry logged while dispatching one request
 */
export interface RequestLogContext {
  requestId: string;
  method: string;
  path: string;
  userAgent?: string;
}

export function createRequestLogger(baseLogger: Logger, context: RequestLogContext): Logger {
  const fields: Record<string, unknown> = {
    requestId: context.requestId,
    method: context.method,
    path: context.path,
  };
  if (context.userAgent) {
    fields.userAgent = context.userAgent;
  }
  return baseLogger.child(fields);
}

let defaultLogger: Logger | null = null;

/**
 * Get the default logger
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const env = process.env.NODE_ENV ?? 'development';
    defaultLogger = new Logger({
      level: env === 'production' ? 'info' : 'debug',
      format: env === 'production' ? 'json' : 'pretty',
    });
  }
  return defaultLogger;
}

export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
