import { pino, type Logger } from 'pino';

export interface CreateLoggerOptions {
  /** Defaults to `LAYERED_HTTP_LOG_LEVEL`, then `silent`. */
  level?: string;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino({
    name: 'layered-http',
    level: options.level ?? process.env.LAYERED_HTTP_LOG_LEVEL ?? 'silent',
  });
}

export type { Logger };
