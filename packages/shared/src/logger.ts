import { getLogLevel, type LogLevel } from './env';

export type Logger = {
  debug: (msg: string, ...details: unknown[]) => void;
  info: (msg: string, ...details: unknown[]) => void;
  warn: (msg: string, ...details: unknown[]) => void;
  error: (msg: string, ...details: unknown[]) => void;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Console logger tagged with a scope, e.g. `[TimelineEngine] set entities`.
 * The threshold is read once, when the logger is created.
 */
export function createLogger(scope: string, level: LogLevel = getLogLevel()): Logger {
  const prefix = `[${scope}]`;
  const enabled = (msgLevel: LogLevel) => LEVEL_RANK[msgLevel] >= LEVEL_RANK[level];

  return {
    debug: (msg, ...details) => {
      if (enabled('debug')) console.debug(prefix, msg, ...details);
    },
    info: (msg, ...details) => {
      if (enabled('info')) console.info(prefix, msg, ...details);
    },
    warn: (msg, ...details) => {
      if (enabled('warn')) console.warn(prefix, msg, ...details);
    },
    error: (msg, ...details) => {
      if (enabled('error')) console.error(prefix, msg, ...details);
    },
  };
}
