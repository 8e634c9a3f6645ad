import { defectAnalyses, detectedDefects } from "@shared/schema";
import type { DefectAnalysis, InsertDefectAnalysis } from "@shared/schema";
import { APIError, mapDatabaseError } from "../../errors";
import { storageLogger } from "../../logger";
import { getDb, eq, desc, sql, count } from "../base";
import type {
  AnalysisStats,
  AnalysisWithDefects,
  DeletedAnalysis,
  IAnalysisStorage,
  NewDetectedDefect,
} from "../interfaces";

function toCountMap(rows: Array<{ key: string; value: number }>): Record<string, number> {
  const result: Record<string, number> = {};
  for (const row of rows) {
    result[row.key] = Number(row.value);
  }
  return result;
}

async function withDatabaseErrors<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof APIError) throw error;
    storageLogger.error({ err: error, operation }, "Database operation failed");
    throw mapDatabaseError(error, "analysis");
  }
}

export class AnalysesStorage implements IAnalysisStorage {
  async createAnalysis(analysis: InsertDefectAnalysis, defects: NewDetectedDefect[]): Promise<AnalysisWithDefects> {
    return withDatabaseErrors("createAnalysis", async () => {
      return getDb().transaction(async (tx) => {
        const [created] = await tx.insert(defectAnalyses).values(analysis).returning();
        const inserted = defects.length > 0
          ? await tx.insert(detectedDefects)
              .values(defects.map(defect => ({ ...defect, analysisId: created.id })))
              .returning()
          : [];
        return { ...created, defects: inserted };
      });
    });
  }

  async getAnalysis(id: string): Promise<AnalysisWithDefects | undefined> {
    return withDatabaseErrors("getAnalysis", async () => {
      const db = getDb();
      const [analysis] = await db.select().from(defectAnalyses).where(eq(defectAnalyses.id, id));
      if (!analysis) return undefined;

      const defects = await db.select().from(detectedDefects)
        .where(eq(detectedDefects.analysisId, id))
        .orderBy(detectedDefects.position);
      return { ...analysis, defects };
    });
  }

  async listAnalyses(limit: number): Promise<DefectAnalysis[]> {
    return withDatabaseErrors("listAnalyses", async () => {
      return getDb().select().from(defectAnalyses)
        .orderBy(desc(defectAnalyses.createdAt))
        .limit(limit);
    });
  }

  async findAnalysisByHash(fileHash: string): Promise<DefectAnalysis | undefined> {
    return withDatabaseErrors("findAnalysisByHash", async () => {
      const [existing] = await getDb().select().from(defectAnalyses)
        .where(eq(defectAnalyses.fileHash, fileHash))
        .orderBy(defectAnalyses.createdAt)
        .limit(1);
      return existing;
    });
  }

  async deleteAnalysis(id: string): Promise<DeletedAnalysis | undefined> {
    return withDatabaseErrors("deleteAnalysis", async () => {
      return getDb().transaction(async (tx) => {
        const [analysis] = await tx.select().from(defectAnalyses).where(eq(defectAnalyses.id, id));
        if (!analysis) return undefined;

        const removed = await tx.delete(detectedDefects)
          .where(eq(detectedDefects.analysisId, id))
          .returning({ id: detectedDefects.id });
        await tx.delete(defectAnalyses).where(eq(defectAnalyses.id, id));

        return { id, filename: analysis.filename, deletedDefects: removed.length };
      });
    });
  }

  async getStats(): Promise<AnalysisStats> {
    return withDatabaseErrors("getStats", async () => {
      const db = getDb();

      const [totals] = await db.select({
        totalAnalyses: count(),
        totalDefects: sql<number>`coalesce(sum(${defectAnalyses.totalDefects}), 0)::int`,
      }).from(defectAnalyses);

      const [confidence] = await db.select({
        average: sql<number>`coalesce(avg(${detectedDefects.confidence}), 0)::float`,
      }).from(detectedDefects);

      const byCategory = await db.select({ key: detectedDefects.category, value: count() })
        .from(detectedDefects).groupBy(detectedDefects.category);
      const bySeverity = await db.select({ key: detectedDefects.severity, value: count() })
        .from(detectedDefects).groupBy(detectedDefects.severity);
      const byArea = await db.select({ key: detectedDefects.area, value: count() })
        .from(detectedDefects).groupBy(detectedDefects.area);
      const byMethod = await db.select({ key: defectAnalyses.processingMethod, value: count() })
        .from(defectAnalyses).groupBy(defectAnalyses.processingMethod);

      const totalAnalyses = Number(totals?.totalAnalyses ?? 0);
      const totalDefects = Number(totals?.totalDefects ?? 0);

      return {
        totalAnalyses,
        totalDefects,
        averageDefectsPerAnalysis: totalAnalyses > 0 ? Math.round((totalDefects / totalAnalyses) * 10) / 10 : 0,
        averageConfidence: Math.round(Number(confidence?.average ?? 0) * 1000) / 1000,
        defectsByCategory: toCountMap(byCategory),
        defectsBySeverity: toCountMap(bySeverity),
        defectsByArea: toCountMap(byArea),
        analysesByMethod: toCountMap(byMethod),
      };
    });
  }

  async ping(): Promise<boolean> {
    return withDatabaseErrors("ping", async () => {
      await getDb().execute(sql`select 1`);
      return true;
    });
  }
}
