import type { InsertDefectAnalysis } from '@shared/schema';
import { apiLogger } from '../../logger';
import type { NewDetectedDefect } from '../../storage/interfaces';
import { splitSentences, takeSentences, toDefectReport, type AnalysisResult, type DefectReport } from '../defect-detection';
import { checkForDuplicate } from '../duplicate-detection';
import type { AnalysisDependencies } from './dependencies';

export interface DocumentUpload {
  buffer: Buffer;
  filename: string;
  mimeType?: string;
}

export interface TextAnalysis {
  result: AnalysisResult;
  sentenceCount: number;
  truncated: boolean;
  textLength: number;
}

export interface StoredAnalysisResponse {
  id: string;
  duplicateOf: string | null;
  truncated: boolean;
  report: DefectReport;
}

/**
 * Runs the engine over at most `limits.maxSentences` sentences of the text.
 * Sentences past the cap are not analysed and the result is flagged as truncated.
 * Short or empty text is a valid input; the minimum length only guards extracted documents.
 */
export function analyzeTextContent(filename: string, text: string, deps: AnalysisDependencies): TextAnalysis {
  const { maxSentences } = deps.limits;
  const sentences = Array.from(takeSentences(splitSentences(text), maxSentences + 1));
  const truncated = sentences.length > maxSentences;
  if (truncated) {
    sentences.length = maxSentences;
    apiLogger.warn({ filename, maxSentences }, 'Document exceeds sentence limit, analysing the leading sentences only');
  }

  const result = deps.engine.analyzeSentences(filename, sentences);
  return { result, sentenceCount: sentences.length, truncated, textLength: text.length };
}

export async function extractAndAnalyze(upload: DocumentUpload, deps: AnalysisDependencies): Promise<TextAnalysis> {
  const document = await deps.extractText(upload.buffer, upload.filename, {
    mimeType: upload.mimeType,
    minTextLength: deps.limits.minTextLength,
  });
  return analyzeTextContent(upload.filename, document.text, deps);
}

function compactCounts(counts: Partial<Record<string, number>>): Record<string, number> {
  const compact: Record<string, number> = {};
  for (const [key, value] of Object.entries(counts)) {
    if (value !== undefined) compact[key] = value;
  }
  return compact;
}

export function toStorageRecords(
  analysis: TextAnalysis,
  fileHash: string,
  duplicateOf: string | null
): { analysis: InsertDefectAnalysis; defects: NewDetectedDefect[] } {
  const { result } = analysis;

  return {
    analysis: {
      filename: result.filename,
      fileHash,
      duplicateOf,
      totalDefects: result.totalDefects,
      summary: compactCounts(result.summary),
      breakdown: result.breakdown.map(entry => ({ ...entry })),
      areaSummary: compactCounts(result.areaSummary),
      processingMethod: result.processingMethod,
      averageConfidence: result.averageConfidence,
      sentenceCount: analysis.sentenceCount,
      textLength: analysis.textLength,
      analyzedAt: new Date(result.timestamp),
    },
    defects: result.defects.map((defect, position) => ({
      category: defect.category,
      keyword: defect.keyword,
      sentence: defect.sentence,
      sentenceIndex: defect.sentenceIndex,
      severity: defect.severity,
      confidence: defect.confidence,
      area: defect.area,
      detectionMethod: defect.detectionMethod,
      position,
    })),
  };
}

async function persist(
  analysis: TextAnalysis,
  content: Buffer | string,
  deps: AnalysisDependencies
): Promise<StoredAnalysisResponse> {
  const duplicate = await checkForDuplicate(content, deps.storage);
  const records = toStorageRecords(analysis, duplicate.fileHash, duplicate.existingAnalysisId);
  const stored = await deps.storage.createAnalysis(records.analysis, records.defects);

  apiLogger.info({
    analysisId: stored.id,
    filename: stored.filename,
    totalDefects: stored.totalDefects,
    duplicateOf: stored.duplicateOf,
    processingMethod: stored.processingMethod,
  }, 'Analysis stored');

  return {
    id: stored.id,
    duplicateOf: stored.duplicateOf,
    truncated: analysis.truncated,
    report: toDefectReport(analysis.result),
  };
}

export async function createAnalysisFromUpload(
  upload: DocumentUpload,
  deps: AnalysisDependencies
): Promise<StoredAnalysisResponse> {
  const analysis = await extractAndAnalyze(upload, deps);
  return persist(analysis, upload.buffer, deps);
}

export async function createAnalysisFromText(
  filename: string,
  text: string,
  deps: AnalysisDependencies
): Promise<StoredAnalysisResponse> {
  const analysis = analyzeTextContent(filename, text, deps);
  return persist(analysis, text, deps);
}
