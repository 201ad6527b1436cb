// Logging for store setup and saves.
//
// Records and setup take a StoreLogger option; silentLogger is used when
// none is given.

export type LogLevel = 'debug' | 'info' | 'warn';

export type LogData = Record<string, unknown>;

export type StoreLogger = { [L in LogLevel]: (message: string, data?: LogData) => void };

function toConsole(level: LogLevel) {
  const label = `[${level.toUpperCase()}]`;
  return (message: string, data?: LogData) => {
    if (data === undefined) {
      console[level](`${label} ${message}`);
    } else {
      console[level](`${label} ${message}`, data);
    }
  };
}

export const consoleLogger: StoreLogger = {
  debug: toConsole('debug'),
  info: toConsole('info'),
  warn: toConsole('warn'),
};

export const silentLogger: StoreLogger = {
  debug() {},
  info() {},
  warn() {},
};

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: LogData;
};

/**
 * Logger that keeps every entry in memory, in call order.
 */
export function createCapturingLogger(): StoreLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const capture = (level: LogLevel) => (message: string, data?: LogData) => {
    entries.push({ level, message, data });
  };

  return {
    entries,
    debug: capture('debug'),
    info: capture('info'),
    warn: capture('warn'),
  };
}
