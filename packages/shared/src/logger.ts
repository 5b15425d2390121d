import pino from 'pino';

const PII_KEYS = new Set([
  'email',
  'studentemail',
  'password',
  'token',
  'secret',
  'ip',
  'ipaddress',
  'remoteaddress',
  'sessionid',
  'authorization',
  'cookie',
  'body',
]);

function isPiiKey(key: string): boolean {
  return PII_KEYS.has(key.toLowerCase());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function redactPii(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isPiiKey(key)) {
      result[key] = '[REDACTED]';
    } else if (isRecord(value)) {
      result[key] = redactPii(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item: unknown) => (isRecord(item) ? redactPii(item) : item));
    } else {
      result[key] = value;
    }
  }
  return result;
}

export interface SafeLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  fatal(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

function wrapPino(logger: pino.Logger): SafeLogger {
  return {
    info(meta: Record<string, unknown>, msg: string) {
      logger.info(redactPii(meta), msg);
    },
    warn(meta: Record<string, unknown>, msg: string) {
      logger.warn(redactPii(meta), msg);
    },
    error(meta: Record<string, unknown>, msg: string) {
      logger.error(redactPii(meta), msg);
    },
    debug(meta: Record<string, unknown>, msg: string) {
      logger.debug(redactPii(meta), msg);
    },
    fatal(meta: Record<string, unknown>, msg: string) {
      logger.fatal(redactPii(meta), msg);
    },
    child(bindings: Record<string, unknown>): SafeLogger {
      return wrapPino(logger.child(redactPii(bindings)));
    },
  };
}

export interface LoggerOptions {
  name: string;
  level?: string;
  /** Defaults to stdout. */
  destination?: pino.DestinationStream;
}

/**
 * Module loggers are created at import time, so the level falls back to
 * LOG_LEVEL from the environment when the caller does not pass one.
 */
export function createLogger(opts: LoggerOptions): SafeLogger {
  const options: pino.LoggerOptions = {
    name: opts.name,
    level: opts.level ?? process.env.LOG_LEVEL ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pinoInstance = opts.destination ? pino(options, opts.destination) : pino(options);
  return wrapPino(pinoInstance);
}
