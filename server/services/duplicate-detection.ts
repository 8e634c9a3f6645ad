import crypto from 'crypto';
import type { DefectAnalysis } from '@shared/schema';
import type { IAnalysisStorage } from '../storage/interfaces';
import { storageLogger } from '../logger';

export interface DuplicateCheckResult {
  isDuplicate: boolean;
  existingAnalysisId: string | null;
  existingAnalysis: DefectAnalysis | null;
  fileHash: string;
}

export function calculateFileHash(content: Buffer | string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

export async function checkForDuplicate(
  content: Buffer | string,
  storage: Pick<IAnalysisStorage, 'findAnalysisByHash'>
): Promise<DuplicateCheckResult> {
  const fileHash = calculateFileHash(content);
  const existing = await storage.findAnalysisByHash(fileHash);

  if (existing) {
    storageLogger.info({
      fileHash,
      existingAnalysisId: existing.id,
      filename: existing.filename,
    }, 'Duplicate document detected');

    return {
      isDuplicate: true,
      existingAnalysisId: existing.id,
      existingAnalysis: existing,
      fileHash,
    };
  }

  return {
    isDuplicate: false,
    existingAnalysisId: null,
    existingAnalysis: null,
    fileHash,
  };
}
