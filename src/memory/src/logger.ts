// Structured logging with pino
// stdout carries the MCP protocol, so every log line goes to stderr

import pino, { type Logger as PinoLogger } from 'pino';
import type { LogLevel } from './config.js';

export interface LogContext {
  [key: string]: unknown;
}

/** Logger interface used across the server */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

function wrapPinoLogger(pinoLogger: PinoLogger): Logger {
  return {
    debug: (msg, ctx) => (ctx ? pinoLogger.debug(ctx, msg) : pinoLogger.debug(msg)),
    info: (msg, ctx) => (ctx ? pinoLogger.info(ctx, msg) : pinoLogger.info(msg)),
    warn: (msg, ctx) => (ctx ? pinoLogger.warn(ctx, msg) : pinoLogger.warn(msg)),
    error: (msg, ctx) => (ctx ? pinoLogger.error(ctx, msg) : pinoLogger.error(msg)),
    child: (bindings) => wrapPinoLogger(pinoLogger.child(bindings)),
  };
}

export function createLogger(name: string, level: LogLevel = "info"): Logger {
  return wrapPinoLogger(
    pino(
      {
        name,
        level,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination(2)
    )
  );
}

/** Logger that drops everything, for callers that do not pass one */
export const silentLogger: Logger = wrapPinoLogger(pino({ level: "silent" }));
