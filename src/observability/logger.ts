import pino from 'pino';
import type { Logger as PinoLogger } from 'pino';
import type { LogContext } from './types.js';

/** Structured logger interface used across the gateway. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

// pino takes the merge object first and the message second.
function wrap(instance: PinoLogger): Logger {
  return {
    debug: (msg, context) => instance.debug(context ?? {}, msg),
    info: (msg, context) => instance.info(context ?? {}, msg),
    warn: (msg, context) => instance.warn(context ?? {}, msg),
    error: (msg, context) => instance.error(context ?? {}, msg),
    fatal: (msg, context) => instance.fatal(context ?? {}, msg),
    child: (bindings) => wrap(instance.child(bindings)),
  };
}

/**
 * Create a structured pino logger instance. `pretty` defaults to
 * `NODE_ENV=development`.
 */
export function createLogger(options?: { level?: string; name?: string; pretty?: boolean }): Logger {
  const pretty = options?.pretty ?? process.env['NODE_ENV'] === 'development';
  const pinoInstance = pino({
    name: options?.name ?? 'agent-gateway',
    level: options?.level ?? process.env['LOG_LEVEL'] ?? 'info',
    transport: pretty ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        'apiKey',
        'authorization',
        'password',
        'secret',
        '*.apiKey',
        '*.password',
        '*.authorization',
      ],
      censor: '[REDACTED]',
    },
  });

  return wrap(pinoInstance);
}
