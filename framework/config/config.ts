/**
 * Configuration Management
 *
 * Loads application configuration from a JSON file and the environment.
 */

import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '../errors.ts';
import { isLogLevel, type LogFormat, type LogLevel } from '../telemetry/logger.ts';

export interface ConfigOptions {
  port?: number;
  host?: string;
  env?: string;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
  /** Deadline in milliseconds applied by the transport to each dispatch */
  requestTimeout?: number;
  /** Include stack traces in the built-in error page */
  showStackTrace?: boolean;
  appName?: string;
  [key: string]: unknown;
}

export const DEFAULT_CONFIG_PATH = './switchyard.json';

const DEFAULT_CONFIG: ConfigOptions = {
  port: 8080,
  host: '0.0.0.0',
  env: 'development',
  logLevel: 'info',
  logFormat: 'json',
  requestTimeout: 30_000,
  showStackTrace: true,
  appName: 'Switchyard',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration manager
 */
export class Config {
  private config: ConfigOptions;

  constructor(options: ConfigOptions = {}) {
    this.config = this.mergeConfig(DEFAULT_CONFIG, options);
  }

  /**
   * Get a configuration value by dotted path
   */
  get<T>(key: string, defaultValue?: T): T {
    const value = this.getNestedValue(this.config, key);
    return (value ?? defaultValue) as T;
  }

  /**
   * Set a configuration value by dotted path
   */
  set(key: string, value: unknown): void {
    this.setNestedValue(this.config, key, value);
  }

  has(key: string): boolean {
    return this.getNestedValue(this.config, key) !== undefined;
  }

  all(): ConfigOptions {
    return { ...this.config };
  }

  get port(): number {
    return this.get<number>('port');
  }

  get host(): string {
    return this.get<string>('host');
  }

  get logLevel(): LogLevel {
    const level = this.get<unknown>('logLevel');
    return isLogLevel(level) ? level : 'info';
  }

  get logFormat(): LogFormat {
    return this.get<unknown>('logFormat') === 'pretty' ? 'pretty' : 'json';
  }

  get requestTimeout(): number {
    return this.get<number>('requestTimeout');
  }

  get showStackTrace(): boolean {
    return this.get<boolean>('showStackTrace') !== false;
  }

  get appName(): string {
    return this.get<string>('appName');
  }

  private mergeConfig(
    base: Record<string, unknown>,
    override: Record<string, unknown>
  ): ConfigOptions {
    const result: ConfigOptions = { ...base };

    for (const [key, value] of Object.entries(override)) {
      if (value === undefined) continue;
      const current = base[key];
      result[key] = isRecord(value) ? this.mergeConfig(isRecord(current) ? current : {}, value) : value;
    }

    return result;
  }

  private getNestedValue(obj: Record<string, unknown>, path: string): unknown {
    let current: unknown = obj;
    for (const key of path.split('.')) {
      if (!isRecord(current)) return undefined;
      current = current[key];
    }
    return current;
  }

  private setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
    const parts = path.split('.');
    const last = parts.pop() ?? path;
    let current = obj;

    for (const part of parts) {
      const next = current[part];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[part] = created;
        current = created;
      }
    }

    current[last] = value;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readConfigFile(path: string): Promise<ConfigOptions> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return {};
    throw new ConfigurationError(`Cannot read config file ${path}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Malformed config file ${path}`, { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

function parseNumber(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`Environment variable ${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Environment overrides, for the variables that are set
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOptions {
  const overrides: ConfigOptions = {
    port: parseNumber('PORT', env.PORT),
    host: env.HOST,
    env: env.NODE_ENV,
    logFormat: env.LOG_FORMAT === 'pretty' || env.LOG_FORMAT === 'json' ? env.LOG_FORMAT : undefined,
    requestTimeout: parseNumber('REQUEST_TIMEOUT', env.REQUEST_TIMEOUT),
    showStackTrace:
      env.SHOW_STACK_TRACE === undefined ? undefined : env.SHOW_STACK_TRACE === 'true',
  };

  const level = env.LOG_LEVEL;
  if (level !== undefined) {
    if (!isLogLevel(level)) {
      throw new ConfigurationError(`Unknown LOG_LEVEL "${level}"`);
    }
    overrides.logLevel = level;
  }

  return overrides;
}

/**
 * Load configuration from a JSON file, then overlay environment variables.
 * A missing file means defaults; a malformed one is a ConfigurationError.
 */
export async function loadConfig(
  configPath = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  const config = new Config(await readConfigFile(configPath));

  for (const [key, value] of Object.entries(configFromEnv(env))) {
    if (value !== undefined) {
      config.set(key, value);
    }
  }

  return config;
}
