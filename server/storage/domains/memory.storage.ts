import { randomUUID } from "crypto";
import type { DefectAnalysis, DetectedDefect, InsertDefectAnalysis } from "@shared/schema";
import type {
  AnalysisStats,
  AnalysisWithDefects,
  DeletedAnalysis,
  IAnalysisStorage,
  NewDetectedDefect,
} from "../interfaces";

function increment(map: Record<string, number>, key: string): void {
  map[key] = (map[key] ?? 0) + 1;
}

/**
 * Process-local analysis store. Backs the service when no database is configured
 * and stands in for PostgreSQL in tests; contents are lost on restart.
 */
export class MemoryAnalysisStorage implements IAnalysisStorage {
  private readonly analyses = new Map<string, DefectAnalysis>();
  private readonly defects = new Map<string, DetectedDefect[]>();
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  async createAnalysis(analysis: InsertDefectAnalysis, defects: NewDetectedDefect[]): Promise<AnalysisWithDefects> {
    const createdAt = this.now();
    const created: DefectAnalysis = {
      id: analysis.id ?? randomUUID(),
      filename: analysis.filename,
      fileHash: analysis.fileHash,
      duplicateOf: analysis.duplicateOf ?? null,
      totalDefects: analysis.totalDefects ?? defects.length,
      summary: analysis.summary,
      breakdown: analysis.breakdown,
      areaSummary: analysis.areaSummary,
      processingMethod: analysis.processingMethod ?? 'rule_based',
      averageConfidence: analysis.averageConfidence ?? 0,
      sentenceCount: analysis.sentenceCount ?? 0,
      textLength: analysis.textLength ?? 0,
      analyzedAt: analysis.analyzedAt,
      createdAt,
    };

    const storedDefects: DetectedDefect[] = defects.map(defect => ({
      id: defect.id ?? randomUUID(),
      analysisId: created.id,
      category: defect.category,
      keyword: defect.keyword,
      sentence: defect.sentence,
      sentenceIndex: defect.sentenceIndex,
      severity: defect.severity,
      confidence: defect.confidence,
      area: defect.area ?? 'general',
      detectionMethod: defect.detectionMethod ?? 'rule_based',
      position: defect.position,
      createdAt,
    }));

    this.analyses.set(created.id, created);
    this.defects.set(created.id, storedDefects);
    return { ...created, defects: [...storedDefects] };
  }

  async getAnalysis(id: string): Promise<AnalysisWithDefects | undefined> {
    const analysis = this.analyses.get(id);
    if (!analysis) return undefined;
    const defects = [...(this.defects.get(id) ?? [])].sort((a, b) => a.position - b.position);
    return { ...analysis, defects };
  }

  async listAnalyses(limit: number): Promise<DefectAnalysis[]> {
    // Insertion order breaks ties between identical timestamps, newest first
    return Array.from(this.analyses.values())
      .map((analysis, order) => ({ analysis, order }))
      .sort((a, b) => b.analysis.createdAt.getTime() - a.analysis.createdAt.getTime() || b.order - a.order)
      .slice(0, limit)
      .map(({ analysis }) => analysis);
  }

  async findAnalysisByHash(fileHash: string): Promise<DefectAnalysis | undefined> {
    for (const analysis of this.analyses.values()) {
      if (analysis.fileHash === fileHash) return analysis;
    }
    return undefined;
  }

  async deleteAnalysis(id: string): Promise<DeletedAnalysis | undefined> {
    const analysis = this.analyses.get(id);
    if (!analysis) return undefined;

    const deletedDefects = this.defects.get(id)?.length ?? 0;
    this.analyses.delete(id);
    this.defects.delete(id);
    return { id, filename: analysis.filename, deletedDefects };
  }

  async getStats(): Promise<AnalysisStats> {
    const defectsByCategory: Record<string, number> = {};
    const defectsBySeverity: Record<string, number> = {};
    const defectsByArea: Record<string, number> = {};
    const analysesByMethod: Record<string, number> = {};
    let totalDefects = 0;
    let confidenceSum = 0;
    let defectCount = 0;

    for (const analysis of this.analyses.values()) {
      totalDefects += analysis.totalDefects;
      increment(analysesByMethod, analysis.processingMethod);
    }
    for (const defects of this.defects.values()) {
      for (const defect of defects) {
        increment(defectsByCategory, defect.category);
        increment(defectsBySeverity, defect.severity);
        increment(defectsByArea, defect.area);
        confidenceSum += defect.confidence;
        defectCount++;
      }
    }

    const totalAnalyses = this.analyses.size;
    return {
      totalAnalyses,
      totalDefects,
      averageDefectsPerAnalysis: totalAnalyses > 0 ? Math.round((totalDefects / totalAnalyses) * 10) / 10 : 0,
      averageConfidence: defectCount > 0 ? Math.round((confidenceSum / defectCount) * 1000) / 1000 : 0,
      defectsByCategory,
      defectsBySeverity,
      defectsByArea,
      analysesByMethod,
    };
  }

  async ping(): Promise<boolean> {
    return true;
  }

  clear(): void {
    this.analyses.clear();
    this.defects.clear();
  }
}
