import { Router, type Request, type Response } from "express";
import { APP_NAME, APP_VERSION } from "@shared/version";
import { isDatabaseAvailable } from "../db";
import { asyncHandler } from "../errors";
import { apiLogger } from "../logger";
import { getDependencies } from "../services/analysis/dependencies";
import type { IAnalysisStorage } from "../storage/interfaces";

export const systemRouter = Router();

type DatabaseStatus = "available" | "unavailable" | "not configured";

async function databaseStatus(storage: IAnalysisStorage): Promise<DatabaseStatus> {
  if (!isDatabaseAvailable()) return "not configured";
  try {
    return (await storage.ping()) ? "available" : "unavailable";
  } catch (err) {
    apiLogger.warn({ err }, "Database health check failed");
    return "unavailable";
  }
}

const healthCheck = asyncHandler(async (_req: Request, res: Response) => {
  const { engine, storage } = getDependencies();
  res.status(200).json({
    status: "ok",
    service: APP_NAME,
    version: APP_VERSION,
    classifier: {
      name: engine.classifierName,
      available: engine.isClassifierAvailable(),
    },
    database: await databaseStatus(storage),
    timestamp: new Date().toISOString(),
  });
});

systemRouter.get("/health", healthCheck);
systemRouter.get("/api/health", healthCheck);
