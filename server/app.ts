import express, { type Express } from "express";
import helmet from "helmet";
import compression from "compression";
import { getConfig, type AppConfig } from "./config";
import { errorHandler, notFoundHandler } from "./errors";
import { httpLogger } from "./logger";
import { correlationIdMiddleware } from "./middleware/correlation-id";
import { createApiRateLimiter } from "./middleware/rate-limit";
import { createAnalysisRouter } from "./routes/analysis.routes";
import { systemRouter } from "./routes/system.routes";

export function createApp(config: AppConfig = getConfig()): Express {
  const app = express();

  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  app.use(helmet());
  app.use(compression());
  app.use(correlationIdMiddleware);
  app.use(httpLogger);

  // Health checks stay ahead of the rate limiter and body parsers
  app.use(systemRouter);

  app.use("/api", createApiRateLimiter(config));
  app.use(express.json({ limit: config.MAX_UPLOAD_BYTES }));
  app.use("/api", createAnalysisRouter(config));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
