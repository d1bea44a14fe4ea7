import "dotenv/config";
import { buildApp } from "./app";
import { closePool, pingDb } from "./clients/db";
import { getConfig, getMatchConfig } from "./utils/config";
import { errorFields, logError, logInfo } from "./utils/logger";
import { resolveThresholds } from "./rag/policy";

async function start() {
  const config = getConfig();
  if (!config.SUPABASE_DB_URL) {
    throw new Error("Missing SUPABASE_DB_URL environment variable");
  }
  if (!config.OPENAI_API_KEY) {
    throw new Error("Missing OPENAI_API_KEY environment variable");
  }
  const thresholds = resolveThresholds(getMatchConfig());

  await pingDb();
  logInfo("db_connected");

  const server = buildApp().listen(config.PORT, () => {
    logInfo("server_listening", { port: config.PORT, thresholds });
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logInfo("server_shutdown", { signal });
    server.close(() => {
      closePool()
        .then(() => {
          logInfo("db_pool_closed");
          process.exit(0);
        })
        .catch((err: unknown) => {
          logError("db_pool_close_failed", errorFields(err));
          process.exit(1);
        });
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

start().catch((err: unknown) => {
  logError("server_start_failed", errorFields(err));
  process.exit(1);
});
