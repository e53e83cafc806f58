export interface Logger {
  log(...data: unknown[]): void;
  info(...data: unknown[]): void;
  warn(...data: unknown[]): void;
  error(...data: unknown[]): void;
  debug(...data: unknown[]): void;
}

export type LogLevel = "log" | "info" | "warn" | "error" | "debug";

export const logWithLogger = (
  logger: Logger | undefined,
  level: LogLevel,
  payload: Record<string, unknown>,
) => {
  if (!logger) {
    return;
  }

  const handler =
    level === "info"
      ? logger.info
      : level === "warn"
        ? logger.warn
        : level === "error"
          ? logger.error
          : level === "debug"
            ? logger.debug
            : logger.log;

  if (handler) {
    handler.call(logger, payload);
  }
};

export function isLogger(value: unknown): value is Logger {
  if (typeof value !== "object" || value === null) {
    return false;
  }

  return (["log", "info", "warn", "error", "debug"] as const).every(
    (level) => level in value && typeof Reflect.get(value, level) === "function",
  );
}
