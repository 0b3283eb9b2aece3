/**
 * Structured logger for the sketch gateway.
 * Everything goes to stderr: stdout carries protocol payloads only.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = 'info';

/**
 * Set the minimum level for all loggers. Called once at startup.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

export function formatMessage(level: LogLevel, module: string, message: string, data?: unknown): string {
  const timestamp = new Date().toISOString();
  const dataStr = data === undefined ? '' : ` ${JSON.stringify(data)}`;
  return `[${timestamp}] [${level.toUpperCase()}] [${module}] ${message}${dataStr}`;
}

function write(level: LogLevel, module: string, message: string, data?: unknown): void {
  if (shouldLog(level)) {
    process.stderr.write(`${formatMessage(level, module, message, data)}\n`);
  }
}

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(module: string) {
  return {
    debug: (message: string, data?: unknown) => write('debug', module, message, data),
    info: (message: string, data?: unknown) => write('info', module, message, data),
    warn: (message: string, data?: unknown) => write('warn', module, message, data),
    error: (message: string, data?: unknown) => write('error', module, message, data),
  };
}
