// =============================================================================
// config.ts
//   Reads settings from the process environment. Bad values fail at startup
//   rather than on the first request that needs them.
// =============================================================================

import { isLogLevel, type LogLevel } from "./utils/log";

export interface AppConfig {
  port:         number;
  host:         string;
  databasePath: string;   // file path, or ":memory:"
  environment:  string;
  logLevel:     LogLevel;
}

const DEFAULTS: AppConfig = {
  port:         8787,
  host:         "0.0.0.0",
  databasePath: "./data/tasks.db",
  environment:  "development",
  logLevel:     "info",
};

function parsePort(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new Error(`PORT must be an integer, got "${raw}"`);
  }
  const port = parseInt(raw, 10);
  if (port < 1 || port > 65535) {
    throw new Error(`PORT must be between 1 and 65535, got ${port}`);
  }
  return port;
}

// Empty strings count as unset — `PORT= npm start` should fall back to the default
function read(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port     = read(env, "PORT");
  const logLevel = read(env, "LOG_LEVEL")?.toLowerCase();

  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`);
  }

  return {
    port:         port !== undefined ? parsePort(port) : DEFAULTS.port,
    host:         read(env, "HOST")          ?? DEFAULTS.host,
    databasePath: read(env, "DATABASE_PATH") ?? DEFAULTS.databasePath,
    environment:  read(env, "ENVIRONMENT")   ?? DEFAULTS.environment,
    logLevel:     logLevel ?? DEFAULTS.logLevel,
  };
}
