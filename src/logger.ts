/**
 * Console-backed logging with a minimum level
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const noop = (): void => {};

/**
 * Create a logger that forwards to `sink` (console by default),
 * dropping entries below `level`
 */
export function createLogger(
  level: LogLevel = 'info',
  sink: Logger = console
): Logger {
  const enabled = (entry: Exclude<LogLevel, 'silent'>) =>
    LEVEL_ORDER[entry] >= LEVEL_ORDER[level];

  return {
    debug: enabled('debug') ? sink.debug.bind(sink) : noop,
    info: enabled('info') ? sink.info.bind(sink) : noop,
    warn: enabled('warn') ? sink.warn.bind(sink) : noop,
    error: enabled('error') ? sink.error.bind(sink) : noop,
  };
}

export const defaultLogger: Logger = createLogger('info');

export const silentLogger: Logger = createLogger('silent');
