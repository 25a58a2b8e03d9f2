/* eslint-disable no-console */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LoggerMetadata = Record<string, unknown>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const consoleWriters = {
  debug: console.debug.bind(console),
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
} as const;

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

const createEmitter =
  (module: string, level: LogLevel) =>
  (message: string, metadata?: LoggerMetadata): void => {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) {
      return;
    }

    const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${module}] ${message}`;
    if (metadata && Object.keys(metadata).length > 0) {
      consoleWriters[level](line, metadata);
    } else {
      consoleWriters[level](line);
    }
  };

export const createLogger = (module: string) => ({
  debug: createEmitter(module, 'debug'),
  info: createEmitter(module, 'info'),
  warn: createEmitter(module, 'warn'),
  error: createEmitter(module, 'error'),
});

export type Logger = ReturnType<typeof createLogger>;

const loggerCache = new Map<string, Logger>();

export const getLogger = (module: string): Logger => {
  const cached = loggerCache.get(module);
  if (cached) {
    return cached;
  }

  const logger = createLogger(module);
  loggerCache.set(module, logger);
  return logger;
};
