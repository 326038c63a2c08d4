// =============================================================================
// utils/log.ts
//   One JSON object per line on stdout/stderr, so any log collector can parse
//   it. `level` and `timestamp` are always the first two keys.
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"] as const;

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info:  20,
  warn:  30,
  error: 40,
};

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function log(level: LogLevel, fields: Record<string, unknown>): void {
  if (SEVERITY[level] < SEVERITY[threshold]) return;

  const line = JSON.stringify({
    level,
    timestamp: new Date().toISOString(),
    ...fields,
  });

  if (level === "error")      console.error(line);
  else if (level === "warn")  console.warn(line);
  else                        console.log(line);
}
