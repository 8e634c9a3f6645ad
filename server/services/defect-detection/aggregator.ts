import { getCategoryOrder } from './taxonomy';
import {
  SEVERITY_RANK,
  type AnalysisResult,
  type BuildingArea,
  type CategoryBreakdown,
  type DefectCategory,
  type DefectMatch,
  type DetectionMethod,
  type KeywordTaxonomy,
} from './types';

export type AttributedMatch = DefectMatch & { ruleOrder: number };

function outranks(candidate: AttributedMatch, current: AttributedMatch): boolean {
  const severityDelta = SEVERITY_RANK[candidate.severity] - SEVERITY_RANK[current.severity];
  if (severityDelta !== 0) return severityDelta > 0;
  if (candidate.confidence !== current.confidence) return candidate.confidence > current.confidence;
  return candidate.ruleOrder < current.ruleOrder;
}

/** Keeps the strongest match per (sentence, category) pair. */
export function collapseDuplicates(matches: Iterable<AttributedMatch>): AttributedMatch[] {
  const best = new Map<string, AttributedMatch>();

  for (const match of matches) {
    const key = `${match.sentenceIndex}\u0000${match.category}`;
    const current = best.get(key);
    if (!current || outranks(match, current)) {
      best.set(key, match);
    }
  }

  return Array.from(best.values());
}

export function sortDefects<T extends DefectMatch>(defects: T[], taxonomy: KeywordTaxonomy): T[] {
  return [...defects].sort((a, b) =>
    SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
    b.confidence - a.confidence ||
    a.sentenceIndex - b.sentenceIndex ||
    getCategoryOrder(taxonomy, a.category) - getCategoryOrder(taxonomy, b.category)
  );
}

export function summarize(
  defects: DefectMatch[],
  taxonomy: KeywordTaxonomy
): { summary: Partial<Record<DefectCategory, number>>; breakdown: CategoryBreakdown[] } {
  const counts = new Map<DefectCategory, number>();
  for (const defect of defects) {
    counts.set(defect.category, (counts.get(defect.category) ?? 0) + 1);
  }

  const summary: Partial<Record<DefectCategory, number>> = {};
  const breakdown: CategoryBreakdown[] = [];

  for (const { label } of taxonomy.categories) {
    const count = counts.get(label);
    if (!count) continue;
    summary[label] = count;
    breakdown.push({
      category: label,
      count,
      percentage: Math.round((count / defects.length) * 1000) / 10,
    });
  }

  return { summary, breakdown };
}

export function summarizeAreas(defects: DefectMatch[], taxonomy: KeywordTaxonomy): Partial<Record<BuildingArea, number>> {
  const counts = new Map<BuildingArea, number>();
  for (const defect of defects) {
    counts.set(defect.area, (counts.get(defect.area) ?? 0) + 1);
  }

  const areaSummary: Partial<Record<BuildingArea, number>> = {};
  const order: BuildingArea[] = [...taxonomy.areas.map(a => a.area), 'general'];
  for (const area of order) {
    const count = counts.get(area);
    if (count) areaSummary[area] = count;
  }
  return areaSummary;
}

export interface AggregateInput {
  filename: string;
  matches: Iterable<AttributedMatch>;
  timestamp: string;
  processingMethod: DetectionMethod;
}

export function aggregate(input: AggregateInput, taxonomy: KeywordTaxonomy): AnalysisResult {
  const defects: DefectMatch[] = sortDefects(collapseDuplicates(input.matches), taxonomy).map(
    ({ ruleOrder: _ruleOrder, ...defect }) => defect
  );
  const { summary, breakdown } = summarize(defects, taxonomy);
  const totalConfidence = defects.reduce((sum, d) => sum + d.confidence, 0);

  return {
    filename: input.filename,
    defects,
    summary,
    totalDefects: defects.length,
    timestamp: input.timestamp,
    breakdown,
    areaSummary: summarizeAreas(defects, taxonomy),
    processingMethod: input.processingMethod,
    averageConfidence: defects.length > 0 ? Math.round((totalConfidence / defects.length) * 1000) / 1000 : 0,
  };
}
