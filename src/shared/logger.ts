export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type LogMethod = (message: string, ...rest: unknown[]) => void;

export type Logger = Record<Exclude<LogLevel, 'silent'>, LogMethod>;

const write: Logger = {
  trace: (message, ...rest) => console.trace(`[focus-timer] ${message}`, ...rest),
  debug: (message, ...rest) => console.debug(`[focus-timer] ${message}`, ...rest),
  info: (message, ...rest) => console.info(`[focus-timer] ${message}`, ...rest),
  warn: (message, ...rest) => console.warn(`[focus-timer] ${message}`, ...rest),
  error: (message, ...rest) => console.error(`[focus-timer] ${message}`, ...rest),
};

const noop: LogMethod = () => {};

/** Console logger that drops anything below `threshold`. */
export function createLogger(threshold: LogLevel = 'warn'): Logger {
  const min = LOG_LEVELS.indexOf(threshold);
  const at = (level: Exclude<LogLevel, 'silent'>): LogMethod =>
    LOG_LEVELS.indexOf(level) >= min ? write[level] : noop;

  return {
    trace: at('trace'),
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
  };
}

export function createNoopLogger(): Logger {
  return { trace: noop, debug: noop, info: noop, warn: noop, error: noop };
}
