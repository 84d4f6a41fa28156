import pino from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL;
  return LOG_LEVELS.find((level) => level === envLevel) ?? "info";
}

export const logger = pino({
  name: "face-redactor",
  level: getLogLevel(),
});

export function createLogger(component: string): pino.Logger {
  return logger.child({ component });
}
