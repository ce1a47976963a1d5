type LogFn = (...args: unknown[]) => void;

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

/** Severity threshold, lowest first. `silent` suppresses everything. */
type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/** Environment variable read by {@link resolveLogLevel} */
const LOG_LEVEL_ENV_VAR = 'ROADSCENE_LOG_LEVEL';

const DEFAULT_LOG_LEVEL: LogLevel = 'info';

const noop: LogFn = () => {};

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

  /**
   * Wrap existing methods so that calls below `level` are dropped.
   */
  static withLevel(methods: LoggerMethods, level: LogLevel): Logger {
    const threshold = LOG_LEVEL_ORDER[level];
    const gate = (method: Exclude<LogLevel, 'silent'>): LogFn =>
      LOG_LEVEL_ORDER[method] >= threshold ? methods[method] : noop;

    return new Logger({
      debug: gate('debug'),
      info: gate('info'),
      warn: gate('warn'),
      error: gate('error'),
    });
  }
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_ORDER, value);
}

/**
 * Resolve a log level from a raw string (usually an environment variable).
 * Unknown or empty values fall back to `info`.
 */
function resolveLogLevel(
  raw: string | undefined = process.env[LOG_LEVEL_ENV_VAR],
): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  if (!normalized || !isLogLevel(normalized)) {
    return DEFAULT_LOG_LEVEL;
  }
  return normalized;
}

/**
 * Logger that forwards to the global console, filtered by level.
 */
function createConsoleLogger(level: LogLevel = resolveLogLevel()): Logger {
  return Logger.withLevel(
    {
      debug: (...args) => console.debug(...args),
      info: (...args) => console.info(...args),
      warn: (...args) => console.warn(...args),
      error: (...args) => console.error(...args),
    },
    level,
  );
}

/** Logger that discards every message */
const silentLogger: LoggerMethods = new Logger({
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
});

export {
  LOG_LEVEL_ENV_VAR,
  Logger,
  createConsoleLogger,
  resolveLogLevel,
  silentLogger,
};
export type { LoggerMethods, LogFn, LogLevel };
