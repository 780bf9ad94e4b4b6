// Structured logging: a message plus flat fields, at one of four levels.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export type Logger = Record<LogLevel, (message: string, fields?: LogFields) => void>;

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: LogFields;
};

function loggerFrom(write: (level: LogLevel, message: string, fields?: LogFields) => void): Logger {
  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
  };
}

export const consoleLogger: Logger = loggerFrom((level, message, fields) => {
  console[level](`[${level.toUpperCase()}] ${message}`, fields ?? '');
});

export const silentLogger: Logger = loggerFrom(() => undefined);

/**
 * Logger that keeps every entry in memory, for tests.
 */
export function createCapturingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = loggerFrom((level, message, data) => {
    entries.push(data === undefined ? { level, message } : { level, message, data });
  });
  return { ...logger, entries };
}

/**
 * Every entry written through the result carries `context` (game id, player id).
 * Fields given at the call site win.
 */
export function withLogContext(logger: Logger, context: LogFields): Logger {
  return loggerFrom((level, message, fields) => logger[level](message, { ...context, ...fields }));
}
