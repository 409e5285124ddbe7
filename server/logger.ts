export type Logger = Pick<Console, "log" | "warn" | "error">;

export type LogLevel = "log" | "warn" | "error";

export function log(message: string, source = "express", logger: Logger = console) {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  logger.log(`${formattedTime} [${source}] ${message}`);
}

export function logJson(
  level: LogLevel,
  message: string,
  payload: Record<string, unknown>,
  logger: Logger = console,
) {
  const entry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    ...payload,
  };
  const line = JSON.stringify(entry);
  if (level === "warn") logger.warn(line);
  else if (level === "error") logger.error(line);
  else logger.log(line);
}

export function describeError(error: unknown) {
  if (error instanceof Error) return error.message;
  return String(error);
}
