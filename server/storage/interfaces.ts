import type {
  DefectAnalysis, InsertDefectAnalysis,
  DetectedDefect, InsertDetectedDefect,
} from "@shared/schema";

export type NewDetectedDefect = Omit<InsertDetectedDefect, "analysisId">;

export interface AnalysisWithDefects extends DefectAnalysis {
  defects: DetectedDefect[];
}

export interface DeletedAnalysis {
  id: string;
  filename: string;
  deletedDefects: number;
}

export interface AnalysisStats {
  totalAnalyses: number;
  totalDefects: number;
  averageDefectsPerAnalysis: number;
  averageConfidence: number;
  defectsByCategory: Record<string, number>;
  defectsBySeverity: Record<string, number>;
  defectsByArea: Record<string, number>;
  analysesByMethod: Record<string, number>;
}

export interface IAnalysisStorage {
  createAnalysis(analysis: InsertDefectAnalysis, defects: NewDetectedDefect[]): Promise<AnalysisWithDefects>;
  getAnalysis(id: string): Promise<AnalysisWithDefects | undefined>;
  listAnalyses(limit: number): Promise<DefectAnalysis[]>;
  findAnalysisByHash(fileHash: string): Promise<DefectAnalysis | undefined>;
  deleteAnalysis(id: string): Promise<DeletedAnalysis | undefined>;
  getStats(): Promise<AnalysisStats>;
  ping(): Promise<boolean>;
}

export interface IStorage extends IAnalysisStorage {}
