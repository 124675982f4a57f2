// Scoped structured logger
// Writes to stderr: stdout carries MCP stdio traffic and CLI output.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function thresholdFromEnv(): LogLevel {
  const env = process.env.LOG_LEVEL?.toLowerCase();
  return env && isLogLevel(env) ? env : 'info';
}

export function createLogger(scope: string, level: LogLevel = thresholdFromEnv()): Logger {
  const min = LEVEL_ORDER[level];

  function log(lvl: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[lvl] < min) return;
    const prefix = `[${scope}:${lvl.toUpperCase()}]`;
    if (data) {
      console.error(`${prefix} ${message}`, JSON.stringify(data));
    } else {
      console.error(`${prefix} ${message}`);
    }
  }

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  };
}

/** Logger that drops everything (tests, library embedding) */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
