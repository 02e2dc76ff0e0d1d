import { getDefaultDbPath } from '@todo-api/core';

export const APP_NAME = 'Todo API';
export const APP_VERSION = '1.0.0';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ServerConfig {
  port: number;
  host: string;
  dbPath: string;
  /** `['*']` allows any origin */
  corsOrigins: string[];
  logLevel: LogLevel;
}

/** Command-line overrides; every field is raw option text */
export interface ServerCliOptions {
  port?: string;
  host?: string;
  db?: string;
  logLevel?: string;
}

type EnvMap = Record<string, string | undefined>;

const DEFAULT_PORT = 8000;
const DEFAULT_HOST = '127.0.0.1';
const DEFAULT_LOG_LEVEL: LogLevel = 'info';

const parsePort = (raw: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(raw ?? '', 10);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 65535) {
    return fallback;
  }
  return parsed;
};

const parseCorsOrigins = (raw: string | undefined): string[] => {
  const origins = (raw ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  return origins.length > 0 ? origins : ['*'];
};

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

const parseLogLevel = (raw: string | undefined, fallback: LogLevel): LogLevel => {
  const normalized = raw?.trim().toLowerCase() ?? '';
  return isLogLevel(normalized) ? normalized : fallback;
};

const hasValue = (value: string | undefined): value is string =>
  typeof value === 'string' && value.trim().length > 0;

export const createServerConfig = (env: EnvMap = process.env): ServerConfig => {
  const host = env['HOST'];

  return {
    port: parsePort(env['PORT'], DEFAULT_PORT),
    host: hasValue(host) ? host.trim() : DEFAULT_HOST,
    dbPath: getDefaultDbPath(env),
    corsOrigins: parseCorsOrigins(env['CORS_ORIGINS']),
    logLevel: parseLogLevel(env['LOG_LEVEL'], DEFAULT_LOG_LEVEL),
  };
};

/** Layer command-line options over an env-derived config */
export const applyCliOverrides = (config: ServerConfig, opts: ServerCliOptions): ServerConfig => ({
  ...config,
  port: parsePort(opts.port, config.port),
  host: hasValue(opts.host) ? opts.host.trim() : config.host,
  dbPath: hasValue(opts.db) ? opts.db.trim() : config.dbPath,
  logLevel: parseLogLevel(opts.logLevel, config.logLevel),
});
