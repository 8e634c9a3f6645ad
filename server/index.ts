import { createServer } from "http";
import { createApp } from "./app";
import { getConfig } from "./config";
import { closeDb, isDatabaseAvailable } from "./db";
import { logger } from "./logger";
import { getDependencies } from "./services/analysis/dependencies";

const config = getConfig();

logger.info({
  env: config.NODE_ENV,
  port: config.PORT,
  database: isDatabaseAvailable() ? "configured" : "not configured",
  matchMode: config.MATCH_MODE,
}, "Starting server");

const deps = getDependencies();

const app = createApp(config);
const httpServer = createServer(app);

httpServer.listen(config.PORT, "0.0.0.0", () => {
  logger.info({
    port: config.PORT,
    classifier: deps.engine.classifierName,
    processingMethod: deps.engine.isClassifierAvailable() ? "hybrid" : "rule_based",
  }, "Server listening");
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "Shutting down");

  await new Promise<void>((resolve) => httpServer.close(() => resolve()));
  await closeDb();
  process.exit(0);
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err) => {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    });
  });
}
