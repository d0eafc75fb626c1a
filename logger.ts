import type { LogLevel } from './types';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type Logger = {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
  child: (scope: string) => Logger;
};

export const createLogger = (scope: string, minLevel: LogLevel = 'info'): Logger => {
  const prefix = `[rss-translate:${scope}]`;
  const enabled = (level: LogLevel) => LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[minLevel];

  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.log(prefix, message, ...details);
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
    child: (childScope) => createLogger(`${scope}:${childScope}`, minLevel),
  };
};

export const silentLogger = (): Logger => ({
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger(),
});
