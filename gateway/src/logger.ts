/**
 * Logger interface for gateway components.
 * Allows optional structured logging with context and message.
 */

export interface Logger {
  debug?: (ctx: object, msg: string) => void;
  info?: (ctx: object, msg: string) => void;
  warn?: (ctx: object, msg: string) => void;
  error?: (ctx: object, msg: string) => void;
}

/** A logger that may also hand out prefixed child loggers via get(name). */
export type LoggerFactory = Logger & { get?(name: string): Logger };

export const consoleLogger: Logger = {
  debug: (ctx, msg) => console.debug(msg, ctx),
  info: (ctx, msg) => console.info(msg, ctx),
  warn: (ctx, msg) => console.warn(msg, ctx),
  error: (ctx, msg) => console.error(msg, ctx),
};

/** Resolve logger from factory (supports loggerFactory or loggerFactory.get(SERVICE_NAME)). */
export function resolveLogger(factory: LoggerFactory | undefined, serviceName: string): Logger {
  return factory?.get?.(serviceName) ?? factory ?? consoleLogger;
}
