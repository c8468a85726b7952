/**
 * Tagged console logger. Lines read `[connection] Connected`, the same shape
 * the rest of the client logs in, filtered by `TETHER_LOG_LEVEL` (or
 * `LOG_LEVEL`). Pass your own `Logger` to route output elsewhere.
 */

const levelWeights = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
} as const;

export type LogLevel = keyof typeof levelWeights;

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelWeights, value);
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = (env['TETHER_LOG_LEVEL'] ?? env['LOG_LEVEL'] ?? 'info').trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

export function createLogger(prefix: string, level: LogLevel = resolveLogLevel()): Logger {
  const enabled = (wanted: LogLevel): boolean => levelWeights[wanted] <= levelWeights[level];
  const tag = `[${prefix}]`;

  return {
    error(message, ...args) {
      if (enabled('error')) console.error(`${tag} ${message}`, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(`${tag} ${message}`, ...args);
    },
    info(message, ...args) {
      if (enabled('info')) console.log(`${tag} ${message}`, ...args);
    },
    debug(message, ...args) {
      if (enabled('debug')) console.debug(`${tag} ${message}`, ...args);
    },
  };
}

const noop = (): void => undefined;

export const silentLogger: Logger = Object.freeze({
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
});
