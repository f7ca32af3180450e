import pino from "pino";

export const logger = pino({
  level: process.env.LOG_LEVEL || "info",
});

export type Logger = pino.Logger;

export function createChildLogger(name: string): Logger {
  return logger.child({ component: name });
}
