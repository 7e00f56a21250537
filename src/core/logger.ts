export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = 'info';

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value);
}

export function setLogLevel(level: LogLevel): void {
  if (!isLogLevel(level)) return;
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

function write(level: LogLevel, line: string, args: unknown[]): void {
  switch (level) {
    case 'debug':
      console.debug(line, ...args);
      break;
    case 'info':
      console.info(line, ...args);
      break;
    case 'warn':
      console.warn(line, ...args);
      break;
    case 'error':
      console.error(line, ...args);
      break;
  }
}

/**
 * Scoped logger over the browser console. Arguments are passed through
 * untouched so devtools can still expand objects and error stacks.
 */
export function createLogger(moduleName: string): Logger {
  const shouldLog = (level: LogLevel): boolean => LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];

  const log = (level: LogLevel, message: string, args: unknown[]): void => {
    if (!shouldLog(level)) return;
    const timestamp = new Date().toISOString();
    write(level, `[${timestamp}] [${level.toUpperCase()}] [${moduleName}] ${message}`, args);
  };

  return {
    debug: (message: string, ...args: unknown[]) => log('debug', message, args),
    info: (message: string, ...args: unknown[]) => log('info', message, args),
    warn: (message: string, ...args: unknown[]) => log('warn', message, args),
    error: (message: string, ...args: unknown[]) => log('error', message, args),
  };
}
