type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const noop: LogFn = () => {};

/**
 * Create a console-backed logger
 *
 * Messages below `minLevel` are dropped (default: 'info').
 */
function getLogger(minLevel: LogLevel = 'info'): Logger {
  const enabled = (level: LogLevel) =>
    LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

  return new Logger({
    debug: enabled('debug') ? (...args) => console.debug(...args) : noop,
    info: enabled('info') ? (...args) => console.info(...args) : noop,
    warn: enabled('warn') ? (...args) => console.warn(...args) : noop,
    error: enabled('error') ? (...args) => console.error(...args) : noop,
  });
}

export { Logger, getLogger };
export type { LoggerMethods, LogFn, LogLevel };
