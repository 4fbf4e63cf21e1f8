import { z } from "zod";

const logLevels = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = typeof logLevels[number];

const levelOrder: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const level: LogLevel = z.enum(logLevels).catch("info").parse(process.env.LOG_LEVEL);

function shouldLog(messageLevel: LogLevel): boolean {
  return levelOrder[messageLevel] >= levelOrder[level];
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (shouldLog("debug")) console.debug(...args);
  },
  info: (...args: unknown[]) => {
    if (shouldLog("info")) console.info(...args);
  },
  warn: (...args: unknown[]) => {
    if (shouldLog("warn")) console.warn(...args);
  },
  error: (...args: unknown[]) => {
    if (shouldLog("error")) console.error(...args);
  },
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
