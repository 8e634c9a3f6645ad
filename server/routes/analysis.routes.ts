import express, { Router, type Request, type Response } from "express";
import { z } from "zod";
import type { AppConfig } from "../config";
import { BadRequestError, NotFoundError, ValidationError, asyncHandler } from "../errors";
import { apiLogger } from "../logger";
import { getDependencies } from "../services/analysis/dependencies";
import {
  createAnalysisFromText,
  createAnalysisFromUpload,
  extractAndAnalyze,
  type DocumentUpload,
} from "../services/analysis/analysis-service";
import { toDefectReport } from "../services/defect-detection";
import { defectsToCsv, exportFilename } from "../services/defect-export";

export const textAnalysisSchema = z.object({
  filename: z.string().trim().min(1).max(255),
  text: z.string(),
});

export const listAnalysesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

const idParamsSchema = z.object({
  id: z.string().trim().min(1).max(64),
});

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
  return result.data;
}

function readFilename(req: Request): string {
  const header = req.get("x-filename");
  const query = typeof req.query.filename === "string" ? req.query.filename : undefined;
  const raw = header ?? query;
  if (!raw || !raw.trim()) {
    throw new BadRequestError("A filename is required in the X-Filename header or the filename query parameter");
  }

  let filename: string;
  try {
    filename = decodeURIComponent(raw.trim());
  } catch {
    throw new BadRequestError("The filename is not valid URI-encoded text");
  }
  return filename.split(/[\\/]/).pop() || filename;
}

function readUpload(req: Request): DocumentUpload {
  const filename = readFilename(req);
  if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
    throw new BadRequestError("The request body must contain the document bytes");
  }
  return { buffer: req.body, filename, mimeType: req.get("content-type") };
}

export function createAnalysisRouter(config: Pick<AppConfig, "MAX_UPLOAD_BYTES">): Router {
  const router = Router();
  const rawUpload = express.raw({ type: () => true, limit: config.MAX_UPLOAD_BYTES });

  router.post("/analyses", rawUpload, asyncHandler(async (req: Request, res: Response) => {
    const upload = readUpload(req);
    const response = await createAnalysisFromUpload(upload, getDependencies());
    res.status(201).json(response);
  }));

  router.post("/analyses/text", asyncHandler(async (req: Request, res: Response) => {
    const { filename, text } = parseOrThrow(textAnalysisSchema, req.body);
    const response = await createAnalysisFromText(filename, text, getDependencies());
    res.status(201).json(response);
  }));

  router.post("/predict", rawUpload, asyncHandler(async (req: Request, res: Response) => {
    const upload = readUpload(req);
    const analysis = await extractAndAnalyze(upload, getDependencies());

    res.json({
      status: "success",
      ...toDefectReport(analysis.result),
      processing_method: analysis.result.processingMethod,
      truncated: analysis.truncated,
    });
  }));

  router.get("/analyses", asyncHandler(async (req: Request, res: Response) => {
    const { limit } = parseOrThrow(listAnalysesQuerySchema, req.query);
    const analyses = await getDependencies().storage.listAnalyses(limit);
    res.json({ analyses, limit });
  }));

  router.get("/analyses/:id", asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseOrThrow(idParamsSchema, req.params);
    const analysis = await getDependencies().storage.getAnalysis(id);
    if (!analysis) {
      throw new NotFoundError("Analysis");
    }
    res.json(analysis);
  }));

  router.get("/analyses/:id/export.csv", asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseOrThrow(idParamsSchema, req.params);
    const analysis = await getDependencies().storage.getAnalysis(id);
    if (!analysis) {
      throw new NotFoundError("Analysis");
    }

    res.setHeader("Content-Type", "text/csv; charset=utf-8");
    res.setHeader("Content-Disposition", `attachment; filename="${exportFilename(analysis.filename)}"`);
    res.send(defectsToCsv(analysis.defects));
  }));

  router.delete("/analyses/:id", asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseOrThrow(idParamsSchema, req.params);
    const deleted = await getDependencies().storage.deleteAnalysis(id);
    if (!deleted) {
      throw new NotFoundError("Analysis");
    }

    apiLogger.info({ analysisId: id, deletedDefects: deleted.deletedDefects }, "Analysis deleted");
    res.json({
      ...deleted,
      message: `Deleted analysis of "${deleted.filename}" and ${deleted.deletedDefects} defect(s)`,
    });
  }));

  router.get("/stats", asyncHandler(async (_req: Request, res: Response) => {
    const stats = await getDependencies().storage.getStats();
    res.json(stats);
  }));

  return router;
}
