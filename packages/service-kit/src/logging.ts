import { LogLevel } from "@nestjs/common";

const LOG_LEVEL_ORDER: LogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];

export function asLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || "").trim().toLowerCase();
  if (normalized === "info") return "log";
  return LOG_LEVEL_ORDER.find((level) => level === normalized) || "log";
}

/** Every Nest level at or above `level`, e.g. "warn" enables fatal, error and warn. */
export function enabledLogLevels(level: LogLevel): LogLevel[] {
  const index = LOG_LEVEL_ORDER.indexOf(level);
  return LOG_LEVEL_ORDER.slice(0, index < 0 ? 4 : index + 1);
}

export function fastifyLogLevel(level: LogLevel): string {
  if (level === "log") return "info";
  if (level === "verbose") return "trace";
  return level;
}
