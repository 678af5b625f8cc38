// Structured logging for the client: pino underneath, a small typed surface on top.
// Credential fields are redacted wherever they appear in log fields.

import pino from 'pino';

export interface LogFields {
  jobKind?: string;
  jobId?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string | Error, fields?: LogFields): void;
  debug(msg: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

export interface LoggerOptions {
  level?: string;
  /** pino-pretty output; defaults to on when NODE_ENV is development. */
  pretty?: boolean;
  /** 1 for stdout, 2 for stderr. */
  fd?: 1 | 2;
}

export const LOG_REDACT_PATHS = [
  'userKey',
  '*.userKey',
  'headers["user-key"]',
  'headers.authorization',
  'headers.Authorization',
];

export function createLogger(options: LoggerOptions = {}): Logger {
  const fd = options.fd ?? 1;
  const pretty = options.pretty ?? process.env.NODE_ENV === 'development';
  const base: pino.LoggerOptions = {
    name: 'factiva-analytics',
    level: options.level ?? (process.env.LOG_LEVEL || 'info'),
    redact: { paths: LOG_REDACT_PATHS, censor: '[redacted]' },
  };

  const instance = pretty
    ? pino({
        ...base,
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:standard', destination: fd },
        },
      })
    : pino(base, pino.destination(fd));
  return wrapPino(instance);
}

export function wrapPino(instance: pino.Logger): Logger {
  const forward =
    (level: 'info' | 'warn' | 'debug') =>
    (msg: string, fields?: LogFields): void => {
      instance[level](fields ?? {}, msg);
    };

  return {
    info: forward('info'),
    warn: forward('warn'),
    debug: forward('debug'),
    error(msg, fields) {
      // pino's default `err` serializer keeps type, message and stack.
      if (msg instanceof Error) instance.error({ ...fields, err: msg }, msg.message);
      else instance.error(fields ?? {}, msg);
    },
    child: (bindings) => wrapPino(instance.child(bindings)),
  };
}

export const logger: Logger = createLogger();

/** Child logger bound to a job kind and, once known, its id. */
export function createJobLogger(jobKind: string, jobId?: string, parent: Logger = logger): Logger {
  return parent.child(jobId === undefined ? { jobKind } : { jobKind, jobId });
}
