import type { LogLevel } from '../config/index.js';

export type LogFields = Record<string, unknown>;

/**
 * Structured logger writing one JSON object per line
 */
export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function serializeError(err: unknown): unknown {
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  return err;
}

function write(level: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): void {
  const entry: LogFields = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };
  if (fields) {
    for (const [key, value] of Object.entries(fields)) {
      entry[key] = key === 'error' ? serializeError(value) : value;
    }
  }

  const line = JSON.stringify(entry);
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

/**
 * Create a logger that drops entries below `minLevel`
 */
export function createLogger(minLevel: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[minLevel];
  const enabled = (level: Exclude<LogLevel, 'silent'>) => LEVEL_ORDER[level] >= threshold;

  return {
    debug: (message, fields) => enabled('debug') && write('debug', message, fields),
    info: (message, fields) => enabled('info') && write('info', message, fields),
    warn: (message, fields) => enabled('warn') && write('warn', message, fields),
    error: (message, fields) => enabled('error') && write('error', message, fields),
  };
}
