// =============================================================================
// server.ts — Node.js entry point
//   config → database → fetch handler served by @hono/node-server.
//   SIGINT/SIGTERM stop accepting connections, then close the database.
// =============================================================================

import { serve } from "@hono/node-server";
import app from "./index";
import { loadConfig } from "./config";
import { openDatabase } from "./db";
import { log, setLogLevel } from "./utils/log";
import type { Env } from "./types/env.types";

const config = loadConfig();
setLogLevel(config.logLevel);

const env: Env = {
  DB:          openDatabase(config.databasePath),
  ENVIRONMENT: config.environment,
};

const server = serve(
  {
    fetch:    (request: Request) => app.fetch(request, env),
    port:     config.port,
    hostname: config.host,
  },
  (info) => {
    log("info", {
      event:       "server_started",
      address:     info.address,
      port:        info.port,
      environment: config.environment,
      database:    config.databasePath,
    });
  }
);

function shutdown(signal: NodeJS.Signals): void {
  log("info", { event: "server_stopping", signal });

  server.close((err?: Error) => {
    env.DB.close();
    if (err) {
      log("error", { event: "server_close_failed", message: err.message });
      process.exitCode = 1;
    }
  });
}

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
