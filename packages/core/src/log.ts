/**
 * Console-backed logger.
 * Everything goes to stderr so stdout stays clean for answers and --json output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

/** Where formatted lines end up. `console.error` by default. */
export type LogSink = (line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function formatLogLine(level: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): string {
  const tag = level === 'info' ? '' : `${level.toUpperCase()}: `;
  if (!fields || Object.keys(fields).length === 0) {
    return `${tag}${message}`;
  }
  return `${tag}${message} ${JSON.stringify(fields)}`;
}

export function createLogger(level: LogLevel = 'info', sink: LogSink = (line) => console.error(line)): Logger {
  const threshold = LEVEL_ORDER[level];
  const emit = (lvl: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[lvl] < threshold) return;
    sink(formatLogLine(lvl, message, fields));
  };

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
  };
}

export const silentLogger: Logger = createLogger('silent');
