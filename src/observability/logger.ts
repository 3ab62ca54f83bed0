import pino from 'pino';
import type { LogContext, LogLevel } from './types.js';

/** Structured logger interface used across the relay. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

/**
 * Create a structured pino logger instance.
 *
 * Arguments are given message-first (`logger.info('msg', { component })`),
 * so the call is forwarded to pino as `(context, msg)`.
 */
export function createLogger(options?: { level?: LogLevel | string; name?: string }): Logger {
  const pinoInstance = pino({
    name: options?.name ?? 'whatsapp-relay',
    level: options?.level ?? process.env['LOG_LEVEL'] ?? 'info',
    transport:
      process.env['NODE_ENV'] === 'development'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        'apiKey',
        'accessToken',
        'verifyToken',
        'authorization',
        '*.apiKey',
        '*.accessToken',
        '*.verifyToken',
        '*.authorization',
      ],
      censor: '[REDACTED]',
    },
  });

  return wrapPino(pinoInstance);
}

function wrapPino(instance: pino.Logger): Logger {
  return {
    debug: (msg, context) => { instance.debug(context ?? {}, msg); },
    info: (msg, context) => { instance.info(context ?? {}, msg); },
    warn: (msg, context) => { instance.warn(context ?? {}, msg); },
    error: (msg, context) => { instance.error(context ?? {}, msg); },
    fatal: (msg, context) => { instance.fatal(context ?? {}, msg); },
    child: (bindings) => wrapPino(instance.child(bindings)),
  };
}
