/**
 * In-memory log buffer with scoped loggers.
 * Entries are always buffered; console output only for errors unless LOG_LEVEL=debug.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  id: string;
  ts: number;
  scope: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

const MAX_LOGS = 500;
const logs: LogEntry[] = [];
let nextId = 1;

function write(scope: string, level: LogLevel, message: string, data?: unknown): LogEntry {
  const entry: LogEntry = {
    id: `log-${nextId++}`,
    ts: Date.now(),
    scope,
    level,
    message,
    data,
  };
  logs.push(entry);
  if (logs.length > MAX_LOGS) logs.shift();

  if (process.env.LOG_LEVEL === 'debug' || level === 'error') {
    console.log(`[${scope}] [${level.toUpperCase()}] ${message}`, data ?? '');
  }
  return entry;
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, data) => void write(scope, 'debug', message, data),
    info: (message, data) => void write(scope, 'info', message, data),
    warn: (message, data) => void write(scope, 'warn', message, data),
    error: (message, data) => void write(scope, 'error', message, data),
  };
}

/** Entries after the given id (all entries when the id is unknown or omitted). */
export function getLogs(afterId?: string): LogEntry[] {
  if (!afterId) return [...logs];
  const idx = logs.findIndex((l) => l.id === afterId);
  if (idx < 0) return [...logs];
  return logs.slice(idx + 1);
}

export function clearLogs(): void {
  logs.length = 0;
}
