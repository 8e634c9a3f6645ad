import { containsKeyword, findKeyword } from './matcher';
import type { BuildingArea, KeywordTaxonomy, MatchMode } from './types';

const CLAUSE_SEPARATOR = /[,;:]|\s(?:and|but|while|whereas|although)\s/g;

export interface Clause {
  start: number;
  end: number;
  text: string;
}

export function splitClauses(normalizedSentence: string): Clause[] {
  const clauses: Clause[] = [];
  const separator = new RegExp(CLAUSE_SEPARATOR.source, 'g');
  let start = 0;
  let match: RegExpExecArray | null;

  while ((match = separator.exec(normalizedSentence)) !== null) {
    clauses.push({ start, end: match.index, text: normalizedSentence.slice(start, match.index) });
    start = match.index + match[0].length;
  }
  clauses.push({ start, end: normalizedSentence.length, text: normalizedSentence.slice(start) });

  return clauses;
}

export function findArea(
  scope: string,
  taxonomy: KeywordTaxonomy,
  mode: MatchMode = 'substring'
): BuildingArea | null {
  for (const definition of taxonomy.areas) {
    if (definition.keywords.some(keyword => containsKeyword(scope, keyword, mode))) {
      return definition.area;
    }
  }
  return null;
}

/**
 * Picks the building area for a defect keyword. The clause holding the keyword is searched
 * first so that "the basement ... and the kitchen ..." attributes each defect to its own room;
 * the whole sentence is the fallback, then "general".
 */
export function attributeArea(
  normalizedSentence: string,
  keyword: string,
  taxonomy: KeywordTaxonomy,
  mode: MatchMode = 'substring'
): BuildingArea {
  const position = findKeyword(normalizedSentence, keyword, mode);

  if (position !== -1) {
    const clause = splitClauses(normalizedSentence).find(c => position >= c.start && position < c.end);
    if (clause) {
      const area = findArea(clause.text, taxonomy, mode);
      if (area) return area;
    }
  }

  return findArea(normalizedSentence, taxonomy, mode) ?? 'general';
}
