import { getConfig } from '../../config';
import { createStorage } from '../../storage';
import type { IAnalysisStorage } from '../../storage/interfaces';
import { MemoryAnalysisStorage } from '../../storage/domains/memory.storage';
import { createDefectEngine, loadClassifier, type DefectDetectionEngine } from '../defect-detection';
import { extractText as realExtractText, type ExtractedDocument, type ExtractionOptions } from '../text-extraction';

export interface AnalysisLimits {
  maxSentences: number;
  minTextLength: number;
}

export interface AnalysisDependencies {
  storage: IAnalysisStorage;
  engine: DefectDetectionEngine;
  extractText: (buffer: Buffer, filename: string, options?: ExtractionOptions) => Promise<ExtractedDocument>;
  limits: AnalysisLimits;
}

export const DEFAULT_LIMITS: AnalysisLimits = {
  maxSentences: 5000,
  minTextLength: 50,
};

export function createProductionDependencies(): AnalysisDependencies {
  const config = getConfig();
  return {
    storage: createStorage(),
    engine: createDefectEngine({
      classifier: loadClassifier(config.CLASSIFIER_MODEL_PATH),
      options: {
        matchMode: config.MATCH_MODE,
        applySeverityQualifiers: config.APPLY_SEVERITY_QUALIFIERS,
        classifierWeight: config.CLASSIFIER_WEIGHT,
      },
    }),
    extractText: realExtractText,
    limits: {
      maxSentences: config.MAX_SENTENCES,
      minTextLength: config.MIN_TEXT_LENGTH,
    },
  };
}

export function createTestDependencies(overrides: Partial<AnalysisDependencies> = {}): AnalysisDependencies {
  const fixedClock = () => new Date('2024-01-15T10:00:00.000Z');

  const defaults: AnalysisDependencies = {
    storage: new MemoryAnalysisStorage(fixedClock),
    engine: createDefectEngine({ clock: fixedClock }),
    extractText: realExtractText,
    limits: { ...DEFAULT_LIMITS },
  };

  return { ...defaults, ...overrides };
}

let currentDependencies: AnalysisDependencies | null = null;

export function setDependencies(deps: AnalysisDependencies): void {
  currentDependencies = deps;
}

export function getDependencies(): AnalysisDependencies {
  if (!currentDependencies) {
    currentDependencies = createProductionDependencies();
  }
  return currentDependencies;
}

export function resetDependencies(): void {
  currentDependencies = null;
}
