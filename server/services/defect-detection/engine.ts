import { logger } from '../../logger';
import { aggregate, type AttributedMatch } from './aggregator';
import { attributeArea } from './area-attributor';
import { NullClassifier } from './classifier';
import { ConfidenceScorer, DEFAULT_CLASSIFIER_WEIGHT } from './confidence';
import { matchSentences } from './matcher';
import { splitSentences } from './normalizer';
import { DEFAULT_TAXONOMY } from './taxonomy';
import type {
  AnalysisResult,
  DefectClassifier,
  DefectReport,
  EngineOptions,
  KeywordTaxonomy,
  Sentence,
} from './types';

const engineLogger = logger.child({ component: 'defect-engine' });

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  matchMode: 'substring',
  applySeverityQualifiers: true,
  classifierWeight: DEFAULT_CLASSIFIER_WEIGHT,
};

export interface EngineDependencies {
  taxonomy: KeywordTaxonomy;
  classifier: DefectClassifier;
  clock: () => Date;
  options: EngineOptions;
}

export class DefectDetectionEngine {
  private readonly taxonomy: KeywordTaxonomy;
  private readonly classifier: DefectClassifier;
  private readonly clock: () => Date;
  private readonly options: EngineOptions;
  private readonly scorer: ConfidenceScorer;

  constructor(deps: EngineDependencies) {
    this.taxonomy = deps.taxonomy;
    this.classifier = deps.classifier;
    this.clock = deps.clock;
    this.options = deps.options;
    this.scorer = new ConfidenceScorer({
      classifier: deps.classifier,
      classifierWeight: deps.options.classifierWeight,
    });
  }

  get classifierName(): string {
    return this.classifier.name;
  }

  isClassifierAvailable(): boolean {
    return this.scorer.hasClassifier();
  }

  analyze(filename: string, text: string): AnalysisResult {
    return this.analyzeSentences(filename, splitSentences(text));
  }

  analyzeSentences(filename: string, sentences: Iterable<Sentence>): AnalysisResult {
    const classifierAvailable = this.scorer.hasClassifier();
    const { taxonomy, options } = this;

    const matches = matchSentences(sentences, taxonomy, {
      mode: options.matchMode,
      applySeverityQualifiers: options.applySeverityQualifiers,
    });

    const attributed: AttributedMatch[] = [];
    for (const raw of matches) {
      const scored = this.scorer.score(raw, classifierAvailable);
      attributed.push({
        category: scored.category,
        keyword: scored.keyword,
        sentence: scored.sentence,
        sentenceIndex: scored.sentenceIndex,
        severity: scored.severity,
        confidence: scored.confidence,
        area: attributeArea(scored.normalizedSentence, scored.keyword, taxonomy, options.matchMode),
        detectionMethod: scored.detectionMethod,
        ruleOrder: scored.ruleOrder,
      });
    }

    const result = aggregate(
      {
        filename,
        matches: attributed,
        timestamp: this.clock().toISOString(),
        processingMethod: classifierAvailable ? 'hybrid' : 'rule_based',
      },
      taxonomy
    );

    engineLogger.debug(
      {
        filename,
        rawMatches: attributed.length,
        totalDefects: result.totalDefects,
        processingMethod: result.processingMethod,
      },
      'Defect analysis completed'
    );

    return result;
  }
}

export function toDefectReport(result: AnalysisResult): DefectReport {
  return {
    filename: result.filename,
    defects: result.defects.map(defect => ({
      type: defect.category,
      keyword: defect.keyword,
      sentence: defect.sentence,
      severity: defect.severity,
      confidence: defect.confidence,
      area: defect.area,
    })),
    summary: { ...result.summary },
    total_defects: result.totalDefects,
    timestamp: result.timestamp,
  };
}

export function createDefectEngine(overrides: Partial<Omit<EngineDependencies, 'options'>> & { options?: Partial<EngineOptions> } = {}): DefectDetectionEngine {
  return new DefectDetectionEngine({
    taxonomy: overrides.taxonomy ?? DEFAULT_TAXONOMY,
    classifier: overrides.classifier ?? new NullClassifier(),
    clock: overrides.clock ?? (() => new Date()),
    options: { ...DEFAULT_ENGINE_OPTIONS, ...overrides.options },
  });
}

let currentEngine: DefectDetectionEngine | null = null;

export function setDefectEngine(engine: DefectDetectionEngine): void {
  currentEngine = engine;
}

export function getDefectEngine(): DefectDetectionEngine {
  if (!currentEngine) {
    currentEngine = createDefectEngine();
  }
  return currentEngine;
}

export function resetDefectEngine(): void {
  currentEngine = null;
}
