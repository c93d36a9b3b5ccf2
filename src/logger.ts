/**
 * Structured logger that writes to stderr. stdout is reserved for the MCP
 * stdio protocol spoken by the local capability provider.
 *
 * Loggers can be narrowed with `child()` so every line of a run carries its
 * runId (and, inside the engine, the step being executed).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

let minLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

function formatMessage(level: LogLevel, component: string, message: string, meta?: LogMeta): string {
  const timestamp = new Date().toISOString();
  const prefix = `[${timestamp}] [${level.toUpperCase()}] [${component}]`;
  const metaStr = meta && Object.keys(meta).length > 0 ? ' ' + JSON.stringify(meta) : '';
  return `${prefix} ${message}${metaStr}`;
}

function write(level: LogLevel, component: string, message: string, meta?: LogMeta): void {
  if (!shouldLog(level)) return;
  process.stderr.write(formatMessage(level, component, message, meta) + '\n');
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(meta: LogMeta): Logger;
}

export function createLogger(component: string, bound: LogMeta = {}): Logger {
  const merge = (meta?: LogMeta): LogMeta => ({ ...bound, ...meta });
  return {
    debug: (message, meta) => write('debug', component, message, merge(meta)),
    info: (message, meta) => write('info', component, message, merge(meta)),
    warn: (message, meta) => write('warn', component, message, merge(meta)),
    error: (message, meta) => write('error', component, message, merge(meta)),
    child: (meta) => createLogger(component, merge(meta)),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
