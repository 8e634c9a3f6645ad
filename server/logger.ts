import { randomUUID } from "crypto";
import pino from "pino";
import pinoHttp from "pino-http";

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";

export const logger = pino({
  level: process.env.LOG_LEVEL || (isProduction ? "info" : isTest ? "silent" : "debug"),
  transport: isProduction || isTest
    ? undefined
    : {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
  base: {
    service: "survey-defect-analyzer",
    env: process.env.NODE_ENV || "development",
  },
  redact: {
    paths: ["req.headers.authorization", "req.headers.cookie", "*.password", "*.secret", "*.token"],
    censor: "[REDACTED]",
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export const httpLogger = pinoHttp({
  logger,
  genReqId: (req) => {
    const correlationId = req.headers["x-correlation-id"];
    return typeof correlationId === "string" && correlationId ? correlationId : randomUUID();
  },
  autoLogging: {
    ignore: (req) => {
      const url = req.url || "";
      return url === "/health" || url === "/api/health" || url.includes(".ico");
    },
  },
  customLogLevel: (req, res, err) => {
    if (res.statusCode >= 500 || err) return "error";
    if (res.statusCode >= 400) return "warn";
    return "info";
  },
  customSuccessMessage: (req, res) => {
    return `${req.method} ${req.url} ${res.statusCode}`;
  },
  customErrorMessage: (req, res, err) => {
    return `${req.method} ${req.url} ${res.statusCode} - ${err?.message || "Error"}`;
  },
  customProps: (req) => ({
    requestId: req.id,
    userAgent: req.headers["user-agent"],
    component: "http",
  }),
});

export const createContextLogger = (context: Record<string, unknown>) => {
  return logger.child(context);
};

export const apiLogger = createContextLogger({ component: "api" });
export const extractionLogger = createContextLogger({ component: "extraction" });
export const storageLogger = createContextLogger({ component: "storage" });
