/**
 * HARI SDK Logging
 *
 * The SDK logs to the console by default. Callers that route logs elsewhere
 * pass their own Logger to the client or the uploader.
 */

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

function write(
  sink: (...data: unknown[]) => void,
  message: string,
  context?: LogContext
): void {
  if (context && Object.keys(context).length > 0) {
    sink(`[hari] ${message}`, context);
  } else {
    sink(`[hari] ${message}`);
  }
}

export const consoleLogger: Logger = {
  debug: (message, context) => write(console.debug, message, context),
  info: (message, context) => write(console.info, message, context),
  warn: (message, context) => write(console.warn, message, context),
  error: (message, context) => write(console.error, message, context),
};

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
