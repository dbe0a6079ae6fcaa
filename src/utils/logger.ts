export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const rank = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

/**
 * Console logger prefixed with `[scope]`. Messages below `level` are dropped.
 */
export const createLogger = (scope: string, level: LogLevel = 'info'): Logger => {
  const enabled = (messageLevel: LogLevel) => rank(messageLevel) >= rank(level);
  const prefix = `[${scope}]`;

  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(prefix, message, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(prefix, message, ...details);
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(prefix, message, ...details);
    },
  };
};

export const silentLogger: Logger = createLogger('silent', 'silent');
