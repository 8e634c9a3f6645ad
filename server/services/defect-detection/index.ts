export * from './types';
export { createTaxonomy, DEFAULT_TAXONOMY, TaxonomyConfigError, CATEGORY_LABELS } from './taxonomy';
export { splitSentences, cleanText, takeSentences, SentenceSequence } from './normalizer';
export { matchSentence, matchSentences } from './matcher';
export { ConfidenceScorer, CONFIDENCE_BANDS, baseConfidence } from './confidence';
export { attributeArea } from './area-attributor';
export { aggregate } from './aggregator';
export { NullClassifier, LogisticKeywordClassifier, loadClassifier } from './classifier';
export {
  DefectDetectionEngine,
  createDefectEngine,
  getDefectEngine,
  setDefectEngine,
  resetDefectEngine,
  toDefectReport,
} from './engine';
