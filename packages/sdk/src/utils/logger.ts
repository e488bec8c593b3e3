/**
 * Minimal structured logger shared by the SDK and the CLI.
 *
 * Lines go to stderr so that command output on stdout (signatures,
 * exported keys) can be piped without interleaving.
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext, error?: Error): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Format a single log line.
 *
 * @example
 * formatLogLine('info', 'Key pair generated', { keyId: 'ab12' })
 * // => '[docsign] INFO Key pair generated {"keyId":"ab12"}'
 */
export function formatLogLine(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): string {
  const prefix = `[docsign] ${level.toUpperCase()} ${message}`;
  if (!context || Object.keys(context).length === 0) {
    return prefix;
  }
  return `${prefix} ${JSON.stringify(context)}`;
}

/**
 * Create a logger that drops everything below `level`.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (l: LogLevel): boolean => LEVEL_ORDER[l] >= threshold;

  return {
    debug(message, context) {
      if (enabled('debug')) console.error(formatLogLine('debug', message, context));
    },
    info(message, context) {
      if (enabled('info')) console.error(formatLogLine('info', message, context));
    },
    warn(message, context) {
      if (enabled('warn')) console.error(formatLogLine('warn', message, context));
    },
    error(message, context, error) {
      if (!enabled('error')) return;
      const merged = error ? { ...context, error: error.message } : context;
      console.error(formatLogLine('error', message, merged));
    },
  };
}

export const silentLogger: Logger = createLogger('silent');
