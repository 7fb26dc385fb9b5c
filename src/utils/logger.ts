/**
 * Simple logger utility wrapping console.error for structured logging
 * stdout stays free for CLI output; LOG_LEVEL picks the threshold
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLevel(value: string | undefined): value is keyof typeof LEVEL_ORDER {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function threshold(): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (isLevel(configured)) {
    return LEVEL_ORDER[configured];
  }
  return process.env.DEBUG ? LEVEL_ORDER.debug : LEVEL_ORDER.info;
}

function emit(level: LogLevel, scope: string | undefined, message: string, args: unknown[]): void {
  if (LEVEL_ORDER[level] < threshold()) {
    return;
  }
  const prefix = scope ? `[${level.toUpperCase()}] [${scope}]` : `[${level.toUpperCase()}]`;
  console.error(`${prefix} ${message}`, ...args);
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger whose lines carry a component prefix, e.g. `[INFO] [LoopbackServer] ...`
 */
export function createLogger(scope?: string): Logger {
  return {
    debug: (message, ...args) => emit('debug', scope, message, args),
    info: (message, ...args) => emit('info', scope, message, args),
    warn: (message, ...args) => emit('warn', scope, message, args),
    error: (message, ...args) => emit('error', scope, message, args)
  };
}

export const log = createLogger();

/**
 * Shorten a secret for diagnostics: first characters plus an ellipsis
 */
export function mask(value: string | undefined | null, visible: number = 6): string {
  if (!value) {
    return 'none';
  }
  if (value.length <= visible) {
    return '***';
  }
  return `${value.substring(0, visible)}...`;
}
