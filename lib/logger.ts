/**
 * Console logging with a `[Scope]` tag per component.
 *
 * Every component takes a `Logger` so callers can silence or redirect output;
 * the default writes `[Scope] message` lines to the console.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Logger for a sub-component, tagged `[Parent:Child]` */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  /** Sink override, mainly for tests */
  write?: (level: Exclude<LogLevel, 'silent'>, line: string, data?: Record<string, unknown>) => void;
}

function consoleWrite(level: Exclude<LogLevel, 'silent'>, line: string, data?: Record<string, unknown>): void {
  const args: unknown[] = data && Object.keys(data).length > 0 ? [line, data] : [line];
  switch (level) {
    case 'debug':
      console.debug(...args);
      break;
    case 'info':
      console.log(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'error':
      console.error(...args);
      break;
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_VALUES[options.level ?? 'info'];
  const write = options.write ?? consoleWrite;
  const scope = options.scope ?? 'Collector';

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>) => {
    if (LEVEL_VALUES[level] < threshold) return;
    write(level, `[${scope}] ${message}`, data);
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
    child: (childScope) => createLogger({ ...options, scope: `${scope}:${childScope}` })
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
