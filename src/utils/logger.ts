/**
 * Logger estructurado (una línea JSON por entrada) para CloudWatch Logs
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function activeLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(configured) ? configured : 'info';
}

function serializeError(error: unknown): { name: string; message: string } | string {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return String(error);
}

function write(level: Exclude<LogLevel, 'silent'>, message: string, meta?: object): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[activeLevel()]) {
    return;
  }

  const line = JSON.stringify({
    level,
    message,
    ...meta,
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

export const logger = {
  debug: (message: string, meta?: object) => write('debug', message, meta),
  info: (message: string, meta?: object) => write('info', message, meta),
  warn: (message: string, meta?: object) => write('warn', message, meta),
  error: (message: string, error?: unknown) =>
    write('error', message, error === undefined ? undefined : { error: serializeError(error) }),
};
