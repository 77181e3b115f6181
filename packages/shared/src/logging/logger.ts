export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Levels from most to least verbose */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  context?: Record<string, unknown>;
}

/** Errors in the context are written as `{ name, message }` */
function contextReplacer(_key: string, value: unknown): unknown {
  return value instanceof Error ? { name: value.name, message: value.message } : value;
}

/**
 * Create a console logger.
 * Lines look like `[timestamp] [LEVEL] [prefix] message {"key":"value"}`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const prefix = options.prefix ?? 'plenar';
  const baseContext = options.context ?? {};
  const minRank = LOG_LEVELS.indexOf(level);

  const write = (at: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LOG_LEVELS.indexOf(at) < minRank) {
      return;
    }
    const merged = { ...baseContext, ...context };
    const suffix = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged, contextReplacer)}` : '';
    console[at](`[${new Date().toISOString()}] [${at.toUpperCase()}] [${prefix}] ${message}${suffix}`);
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    child: (context) => createLogger({ level, prefix, context: { ...baseContext, ...context } }),
  };
}
