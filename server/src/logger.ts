import type { LogLevel } from "./config";

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const createLogger = (scope: string, level: LogLevel = "info"): Logger => {
  const prefix = `[${scope}]`;
  const enabled = (at: LogLevel): boolean => RANK[at] >= RANK[level];

  return {
    debug(message, ...meta) {
      if (enabled("debug")) console.debug(prefix, message, ...meta);
    },
    info(message, ...meta) {
      if (enabled("info")) console.log(prefix, message, ...meta);
    },
    warn(message, ...meta) {
      if (enabled("warn")) console.warn(prefix, message, ...meta);
    },
    error(message, ...meta) {
      if (enabled("error")) console.error(prefix, message, ...meta);
    },
  };
};
