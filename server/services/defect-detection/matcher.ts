import type { KeywordTaxonomy, MatchMode, RawMatch, Sentence, Severity } from './types';

const wordPatternCache = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function wordPattern(keyword: string): RegExp {
  let pattern = wordPatternCache.get(keyword);
  if (!pattern) {
    pattern = new RegExp(`(?<![a-z0-9])${escapeRegExp(keyword)}(?![a-z0-9])`);
    wordPatternCache.set(keyword, pattern);
  }
  return pattern;
}

/** Position of the keyword in an already lowercased sentence, or -1. */
export function findKeyword(normalizedSentence: string, keyword: string, mode: MatchMode = 'substring'): number {
  if (mode === 'word') {
    const match = wordPattern(keyword).exec(normalizedSentence);
    return match ? match.index : -1;
  }
  return normalizedSentence.indexOf(keyword);
}

export function containsKeyword(normalizedSentence: string, keyword: string, mode: MatchMode = 'substring'): boolean {
  return findKeyword(normalizedSentence, keyword, mode) !== -1;
}

/**
 * Sentence-level severity override: a high qualifier raises every match to High,
 * otherwise a low qualifier lowers every match to Low.
 */
export function qualifySeverity(
  normalizedSentence: string,
  ruleSeverity: Severity,
  taxonomy: KeywordTaxonomy,
  mode: MatchMode = 'substring'
): Severity {
  const { high, low } = taxonomy.severityQualifiers;
  if (high.some(word => containsKeyword(normalizedSentence, word, mode))) return 'High';
  if (low.some(word => containsKeyword(normalizedSentence, word, mode))) return 'Low';
  return ruleSeverity;
}

export interface MatchOptions {
  mode?: MatchMode;
  applySeverityQualifiers?: boolean;
}

export function matchSentence(
  sentence: Sentence,
  taxonomy: KeywordTaxonomy,
  options: MatchOptions = {}
): RawMatch[] {
  const mode = options.mode ?? 'substring';
  const matches: RawMatch[] = [];

  for (const rule of taxonomy.rules) {
    if (!containsKeyword(sentence.normalized, rule.keyword, mode)) continue;

    matches.push({
      sentenceIndex: sentence.index,
      sentence: sentence.text,
      normalizedSentence: sentence.normalized,
      category: rule.category,
      keyword: rule.keyword,
      severity: options.applySeverityQualifiers
        ? qualifySeverity(sentence.normalized, rule.severity, taxonomy, mode)
        : rule.severity,
      ruleOrder: rule.order,
    });
  }

  return matches;
}

export function* matchSentences(
  sentences: Iterable<Sentence>,
  taxonomy: KeywordTaxonomy,
  options: MatchOptions = {}
): Generator<RawMatch> {
  for (const sentence of sentences) {
    yield* matchSentence(sentence, taxonomy, options);
  }
}
