export type Severity = 'High' | 'Medium' | 'Low';

export type CategoryId =
  | 'structural'
  | 'moisture'
  | 'electrical'
  | 'plumbing'
  | 'mold'
  | 'corrosion'
  | 'general';

export type DefectCategory =
  | 'Structural'
  | 'Moisture & Damp'
  | 'Electrical'
  | 'Plumbing'
  | 'Mold & Fungus'
  | 'Corrosion & Rust'
  | 'General Structural';

export type BuildingArea =
  | 'basement'
  | 'foundation'
  | 'kitchen'
  | 'bathroom'
  | 'electrical'
  | 'exterior'
  | 'roof'
  | 'general';

export type MatchMode = 'substring' | 'word';

export type DetectionMethod = 'rule_based' | 'hybrid';

export const SEVERITY_RANK: Record<Severity, number> = {
  High: 3,
  Medium: 2,
  Low: 1,
};

export interface Sentence {
  index: number;
  offset: number;
  text: string;
  normalized: string;
}

export interface KeywordRule {
  category: DefectCategory;
  keyword: string;
  severity: Severity;
  order: number;
}

export interface CategoryDefinition {
  id: CategoryId;
  label: DefectCategory;
  order: number;
}

export interface AreaDefinition {
  area: Exclude<BuildingArea, 'general'>;
  keywords: readonly string[];
}

export interface SeverityQualifiers {
  high: readonly string[];
  low: readonly string[];
}

export interface KeywordTaxonomy {
  readonly categories: readonly CategoryDefinition[];
  readonly rules: readonly KeywordRule[];
  readonly areas: readonly AreaDefinition[];
  readonly severityQualifiers: SeverityQualifiers;
}

export interface RawMatch {
  sentenceIndex: number;
  sentence: string;
  normalizedSentence: string;
  category: DefectCategory;
  keyword: string;
  severity: Severity;
  ruleOrder: number;
}

export interface ScoredMatch extends RawMatch {
  confidence: number;
  detectionMethod: DetectionMethod;
}

export interface DefectMatch {
  category: DefectCategory;
  keyword: string;
  sentence: string;
  sentenceIndex: number;
  severity: Severity;
  confidence: number;
  area: BuildingArea;
  detectionMethod: DetectionMethod;
}

export interface CategoryBreakdown {
  category: DefectCategory;
  count: number;
  percentage: number;
}

export interface AnalysisResult {
  filename: string;
  defects: DefectMatch[];
  summary: Partial<Record<DefectCategory, number>>;
  totalDefects: number;
  timestamp: string;
  breakdown: CategoryBreakdown[];
  areaSummary: Partial<Record<BuildingArea, number>>;
  processingMethod: DetectionMethod;
  averageConfidence: number;
}

/** Flat wire shape handed to persistence, exports and API responses. */
export interface DefectReport {
  filename: string;
  defects: Array<{
    type: DefectCategory;
    keyword: string;
    sentence: string;
    severity: Severity;
    confidence: number;
    area: BuildingArea;
  }>;
  summary: Partial<Record<DefectCategory, number>>;
  total_defects: number;
  timestamp: string;
}

export interface DefectClassifier {
  readonly name: string;
  isAvailable(): boolean;
  /** Probability in [0, 1] that the sentence describes a defect of the category, or null when it cannot say. */
  score(sentence: string, category: DefectCategory): number | null;
}

export interface EngineOptions {
  matchMode: MatchMode;
  applySeverityQualifiers: boolean;
  classifierWeight: number;
}
