export type LogContext = Readonly<Record<string, unknown>>;

/**
 * Minimal structured logger. Components take one optionally and fall back
 * to the console implementation.
 */
export interface Logger {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

function write(level: 'info' | 'warn' | 'error', message: string, context?: LogContext): void {
  const line = JSON.stringify({
    level,
    message,
    ...context,
    timestamp: new Date().toISOString(),
  });
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

/** One JSON line per event on the console. */
export const consoleLogger: Logger = {
  info: (message, context) => write('info', message, context),
  warn: (message, context) => write('warn', message, context),
  error: (message, context) => write('error', message, context),
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
