import { describe, it, expect } from 'vitest';
import {
  aggregate,
  collapseDuplicates,
  sortDefects,
  summarize,
  summarizeAreas,
  type AttributedMatch,
} from '../server/services/defect-detection/aggregator';
import { DEFAULT_TAXONOMY } from '../server/services/defect-detection/taxonomy';

function match(overrides: Partial<AttributedMatch> = {}): AttributedMatch {
  return {
    category: 'Structural',
    keyword: 'crack',
    sentence: 'The wall is cracked.',
    sentenceIndex: 0,
    severity: 'Medium',
    confidence: 0.608,
    area: 'general',
    detectionMethod: 'rule_based',
    ruleOrder: 0,
    ...overrides,
  };
}

describe('Defect Aggregation', () => {
  describe('collapseDuplicates', () => {
    it('should keep one defect per sentence and category', () => {
      const result = collapseDuplicates([
        match({ keyword: 'crack', ruleOrder: 0 }),
        match({ keyword: 'cracked', ruleOrder: 1 }),
        match({ category: 'Moisture & Damp', keyword: 'damp', ruleOrder: 11 }),
        match({ sentenceIndex: 1, keyword: 'crack', ruleOrder: 0 }),
      ]);

      expect(result.map(m => [m.sentenceIndex, m.category, m.keyword])).toEqual([
        [0, 'Structural', 'crack'],
        [0, 'Moisture & Damp', 'damp'],
        [1, 'Structural', 'crack'],
      ]);
    });

    it('should prefer the higher severity', () => {
      const [kept] = collapseDuplicates([
        match({ keyword: 'crack', severity: 'Medium', confidence: 0.608, ruleOrder: 0 }),
        match({ keyword: 'foundation crack', severity: 'High', confidence: 0.925, ruleOrder: 5 }),
      ]);
      expect(kept.keyword).toBe('foundation crack');
    });

    it('should prefer the higher confidence at equal severity', () => {
      const [kept] = collapseDuplicates([
        match({ keyword: 'crack', confidence: 0.608, ruleOrder: 0 }),
        match({ keyword: 'structural crack', confidence: 0.695, ruleOrder: 6 }),
      ]);
      expect(kept.keyword).toBe('structural crack');
    });

    it('should prefer the earlier rule when severity and confidence tie', () => {
      const [kept] = collapseDuplicates([
        match({ keyword: 'cracked', ruleOrder: 1 }),
        match({ keyword: 'crack', ruleOrder: 0 }),
      ]);
      expect(kept.keyword).toBe('crack');
    });
  });

  describe('sortDefects', () => {
    it('should order by severity, confidence, sentence position and category', () => {
      const sorted = sortDefects(
        [
          match({ keyword: 'a', severity: 'Low', confidence: 0.308 }),
          match({ keyword: 'b', severity: 'High', confidence: 0.88, sentenceIndex: 2 }),
          match({ keyword: 'c', severity: 'High', confidence: 0.925, sentenceIndex: 3 }),
          match({ keyword: 'd', severity: 'High', confidence: 0.88, sentenceIndex: 1, category: 'Plumbing' }),
          match({ keyword: 'e', severity: 'High', confidence: 0.88, sentenceIndex: 1, category: 'Electrical' }),
        ],
        DEFAULT_TAXONOMY
      );

      expect(sorted.map(d => d.keyword)).toEqual(['c', 'e', 'd', 'b', 'a']);
    });

    it('should not mutate its input', () => {
      const input = [match({ keyword: 'low', severity: 'Low' }), match({ keyword: 'high', severity: 'High' })];
      sortDefects(input, DEFAULT_TAXONOMY);
      expect(input.map(d => d.keyword)).toEqual(['low', 'high']);
    });
  });

  describe('summarize', () => {
    it('should count categories in taxonomy order with percentages', () => {
      const { summary, breakdown } = summarize(
        [
          match({ category: 'Plumbing' }),
          match({ category: 'Structural' }),
          match({ category: 'Plumbing' }),
        ],
        DEFAULT_TAXONOMY
      );

      expect(summary).toEqual({ Structural: 1, Plumbing: 2 });
      expect(Object.keys(summary)).toEqual(['Structural', 'Plumbing']);
      expect(breakdown).toEqual([
        { category: 'Structural', count: 1, percentage: 33.3 },
        { category: 'Plumbing', count: 2, percentage: 66.7 },
      ]);
    });

    it('should return empty structures without defects', () => {
      expect(summarize([], DEFAULT_TAXONOMY)).toEqual({ summary: {}, breakdown: [] });
    });
  });

  describe('summarizeAreas', () => {
    it('should count areas in priority order with general last', () => {
      const areas = summarizeAreas(
        [match({ area: 'general' }), match({ area: 'roof' }), match({ area: 'basement' }), match({ area: 'roof' })],
        DEFAULT_TAXONOMY
      );

      expect(areas).toEqual({ basement: 1, roof: 2, general: 1 });
      expect(Object.keys(areas)).toEqual(['basement', 'roof', 'general']);
    });
  });

  describe('aggregate', () => {
    it('should build a consistent result without rule bookkeeping', () => {
      const result = aggregate(
        {
          filename: 'survey.txt',
          timestamp: '2024-01-15T10:00:00.000Z',
          processingMethod: 'rule_based',
          matches: [
            match({ keyword: 'crack', severity: 'High', confidence: 0.88, area: 'basement' }),
            match({ keyword: 'cracks', severity: 'High', confidence: 0.88, area: 'basement', ruleOrder: 3 }),
            match({ category: 'Mold & Fungus', keyword: 'mold', severity: 'Medium', confidence: 0.608, area: 'kitchen', ruleOrder: 39 }),
          ],
        },
        DEFAULT_TAXONOMY
      );

      expect(result).toEqual({
        filename: 'survey.txt',
        defects: [
          {
            category: 'Structural',
            keyword: 'crack',
            sentence: 'The wall is cracked.',
            sentenceIndex: 0,
            severity: 'High',
            confidence: 0.88,
            area: 'basement',
            detectionMethod: 'rule_based',
          },
          {
            category: 'Mold & Fungus',
            keyword: 'mold',
            sentence: 'The wall is cracked.',
            sentenceIndex: 0,
            severity: 'Medium',
            confidence: 0.608,
            area: 'kitchen',
            detectionMethod: 'rule_based',
          },
        ],
        summary: { Structural: 1, 'Mold & Fungus': 1 },
        totalDefects: 2,
        timestamp: '2024-01-15T10:00:00.000Z',
        breakdown: [
          { category: 'Structural', count: 1, percentage: 50 },
          { category: 'Mold & Fungus', count: 1, percentage: 50 },
        ],
        areaSummary: { basement: 1, kitchen: 1 },
        processingMethod: 'rule_based',
        averageConfidence: 0.744,
      });
    });

    it('should report zero defects for no matches', () => {
      const result = aggregate(
        { filename: 'empty.txt', timestamp: '2024-01-15T10:00:00.000Z', processingMethod: 'rule_based', matches: [] },
        DEFAULT_TAXONOMY
      );

      expect(result.totalDefects).toBe(0);
      expect(result.defects).toEqual([]);
      expect(result.summary).toEqual({});
      expect(result.averageConfidence).toBe(0);
    });
  });
});
