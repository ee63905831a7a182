/**
 * Logging goes to stderr: stdout carries JSON-RPC (server) or the result graph (CLI).
 */

export type LogLevel = 'error' | 'warn' | 'info';

export const LOG_LEVEL_ENV = 'OCEAN_LOG_LEVEL';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
};

export interface Logger {
  error(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
}

function isLogLevel(value: string): value is LogLevel {
  return value === 'error' || value === 'warn' || value === 'info';
}

export function logLevelFromEnv(): LogLevel {
  const raw = process.env[LOG_LEVEL_ENV]?.trim().toLowerCase() ?? '';
  return isLogLevel(raw) ? raw : 'warn';
}

export function createStderrLogger(level: LogLevel = logLevelFromEnv()): Logger {
  const emit = (msgLevel: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (LEVEL_PRIORITY[msgLevel] > LEVEL_PRIORITY[level]) return;
    const prefix = msgLevel === 'info' ? '[ocean-mcp]' : `[ocean-mcp] ${msgLevel.toUpperCase()}:`;
    if (data && Object.keys(data).length > 0) {
      console.error(`${prefix} ${message}`, JSON.stringify(data));
    } else {
      console.error(`${prefix} ${message}`);
    }
  };
  return {
    error: (message, data) => emit('error', message, data),
    warn: (message, data) => emit('warn', message, data),
    info: (message, data) => emit('info', message, data),
  };
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

/** Forward to `inner` and keep every entry, for returning diagnostics to a caller. */
export function createCollectingLogger(inner?: Logger): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string, data?: Record<string, unknown>): void => {
    entries.push(data === undefined ? { level, message } : { level, message, data });
    inner?.[level](message, data);
  };
  return {
    logger: { error: record('error'), warn: record('warn'), info: record('info') },
    entries,
  };
}
