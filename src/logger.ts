/**
 * Leveled console logger for the relay.
 * @packageDocumentation
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[opts.level ?? 'info'];
  const prefix = opts.prefix ?? '[relay]';
  const enabled = (level: Exclude<LogLevel, 'silent'>) => LEVEL_ORDER[level] >= threshold;
  const stamp = () => new Date().toISOString().slice(11, 19);

  return {
    debug: (msg, ...args) => {
      if (enabled('debug')) console.debug(`${stamp()} ${prefix} ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled('info')) console.log(`${stamp()} ${prefix} ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled('warn')) console.warn(`${stamp()} ${prefix} ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled('error')) console.error(`${stamp()} ${prefix} ${msg}`, ...args);
    },
  };
}

export const defaultLogger: Logger = createLogger();

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger({ level: 'silent' });

/**
 * Describe an error with its concrete kind, e.g. `ConnectionError(ECONNREFUSED): connect ...`.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    const kind = code ? `${err.name}(${code})` : err.name;
    return `${kind}: ${err.message}`;
  }
  return String(err);
}
