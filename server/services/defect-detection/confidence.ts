import { logger } from '../../logger';
import type { DefectClassifier, RawMatch, ScoredMatch, Severity } from './types';

const scoringLogger = logger.child({ component: 'confidence-scoring' });

export interface ConfidenceBand {
  min: number;
  max: number;
}

export const CONFIDENCE_BANDS: Record<Severity, ConfidenceBand> = {
  High: { min: 0.85, max: 1.0 },
  Medium: { min: 0.55, max: 0.84 },
  Low: { min: 0.25, max: 0.54 },
};

// Indexed by keyword word count - 1, capped at three words.
const KEYWORD_SPECIFICITY = [0.2, 0.5, 0.8];

export const DEFAULT_CLASSIFIER_WEIGHT = 0.3;

function roundConfidence(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function clampToBand(value: number, band: ConfidenceBand): number {
  return Math.min(band.max, Math.max(band.min, value));
}

export function keywordSpecificity(keyword: string): number {
  const words = keyword.split(/[\s-]+/).filter(Boolean).length;
  return KEYWORD_SPECIFICITY[Math.min(Math.max(words, 1), KEYWORD_SPECIFICITY.length) - 1];
}

export function baseConfidence(severity: Severity, keyword: string): number {
  const band = CONFIDENCE_BANDS[severity];
  return roundConfidence(band.min + (band.max - band.min) * keywordSpecificity(keyword));
}

export function blendConfidence(
  base: number,
  probability: number,
  severity: Severity,
  weight: number = DEFAULT_CLASSIFIER_WEIGHT
): number {
  const w = Math.min(1, Math.max(0, weight));
  const p = Math.min(1, Math.max(0, probability));
  return roundConfidence(clampToBand((1 - w) * base + w * p, CONFIDENCE_BANDS[severity]));
}

export interface ConfidenceScorerOptions {
  classifier?: DefectClassifier | null;
  classifierWeight?: number;
}

/**
 * Scores raw matches from their severity band and keyword specificity. When a classifier is
 * available its probability is blended in; any classifier failure leaves the rule score in place.
 */
export class ConfidenceScorer {
  private readonly classifier: DefectClassifier | null;
  private readonly weight: number;

  constructor(options: ConfidenceScorerOptions = {}) {
    this.classifier = options.classifier ?? null;
    this.weight = options.classifierWeight ?? DEFAULT_CLASSIFIER_WEIGHT;
  }

  hasClassifier(): boolean {
    if (!this.classifier) return false;
    try {
      return this.classifier.isAvailable();
    } catch (error) {
      scoringLogger.warn({ err: error, classifier: this.classifier.name }, 'Classifier availability check failed');
      return false;
    }
  }

  score(match: RawMatch, classifierAvailable: boolean = this.hasClassifier()): ScoredMatch {
    const base = baseConfidence(match.severity, match.keyword);

    if (!classifierAvailable || !this.classifier) {
      return { ...match, confidence: base, detectionMethod: 'rule_based' };
    }

    let probability: number | null;
    try {
      probability = this.classifier.score(match.sentence, match.category);
    } catch (error) {
      scoringLogger.warn(
        { err: error, classifier: this.classifier.name, category: match.category },
        'Classifier scoring failed, using rule-based confidence'
      );
      return { ...match, confidence: base, detectionMethod: 'rule_based' };
    }

    if (probability === null || !Number.isFinite(probability)) {
      return { ...match, confidence: base, detectionMethod: 'rule_based' };
    }

    return {
      ...match,
      confidence: blendConfidence(base, probability, match.severity, this.weight),
      detectionMethod: 'hybrid',
    };
  }
}
