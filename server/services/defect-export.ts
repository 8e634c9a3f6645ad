export interface ExportableDefect {
  category: string;
  keyword: string;
  severity: string;
  confidence: number;
  area: string;
  sentence: string;
}

export const CSV_HEADERS = ['Type', 'Keyword', 'Severity', 'Confidence', 'Area', 'Sentence'] as const;
export const MAX_SENTENCE_LENGTH = 100;

export function escapeCsvField(value: string | number): string {
  return `"${String(value).replace(/"/g, '""')}"`;
}

export function truncateSentence(sentence: string, maxLength: number = MAX_SENTENCE_LENGTH): string {
  const characters = Array.from(sentence);
  return characters.length > maxLength ? `${characters.slice(0, maxLength).join('')}...` : sentence;
}

export function defectsToCsv(defects: ExportableDefect[]): string {
  const rows = [
    CSV_HEADERS.map(escapeCsvField).join(','),
    ...defects.map(defect => [
      defect.category,
      defect.keyword,
      defect.severity,
      defect.confidence.toFixed(3),
      defect.area,
      truncateSentence(defect.sentence),
    ].map(escapeCsvField).join(',')),
  ];
  return rows.join('\n') + '\n';
}

export function exportFilename(filename: string): string {
  const base = filename.replace(/\.[^.]+$/, '').replace(/[^a-zA-Z0-9_-]+/g, '_');
  return `defect_analysis_${base || 'document'}.csv`;
}
