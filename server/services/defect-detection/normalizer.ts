import type { Sentence } from './types';

const BOILERPLATE_PATTERNS: RegExp[] = [
  /^\d+$/,
  /^page\s+\d+(\s+of\s+\d+)?$/i,
  /^date\s*:/i,
];

// Header and footer notices; only checked on lines short enough to be one.
const NOTICE_PATTERNS: RegExp[] = [
  /^(strictly\s+|private\s+and\s+)?confidential\b/i,
  /^(copyright\b|©|\(c\)\s)/i,
];

const MIN_LINE_LENGTH = 4;
const MAX_NOTICE_LENGTH = 80;

const SENTENCE_BOUNDARY = /[.!?](?=\s)/g;

function isBoilerplate(line: string): boolean {
  if (line.length < MIN_LINE_LENGTH) return true;
  if (BOILERPLATE_PATTERNS.some(pattern => pattern.test(line))) return true;
  return line.length <= MAX_NOTICE_LENGTH && NOTICE_PATTERNS.some(pattern => pattern.test(line));
}

/**
 * Drops header/footer lines (page markers, dates, confidentiality notices, bare numbers)
 * and collapses every run of whitespace to a single space.
 */
export function cleanText(text: string): string {
  if (!text) return '';

  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => !isBoilerplate(line))
    .join(' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function* iterateSentences(cleaned: string): Generator<Sentence> {
  let index = 0;
  let start = 0;

  const emit = (end: number): Sentence | null => {
    const raw = cleaned.slice(start, end);
    const text = raw.trim();
    if (!text) return null;
    const offset = start + (raw.length - raw.trimStart().length);
    return { index: index++, offset, text, normalized: text.toLowerCase() };
  };

  const boundary = new RegExp(SENTENCE_BOUNDARY.source, 'g');
  let match: RegExpExecArray | null;
  while ((match = boundary.exec(cleaned)) !== null) {
    const end = match.index + 1;
    const sentence = emit(end);
    if (sentence) yield sentence;
    start = end;
  }

  const tail = emit(cleaned.length);
  if (tail) yield tail;
}

/** Lazy sentence sequence over a cleaned document; every iteration starts again from the first sentence. */
export class SentenceSequence implements Iterable<Sentence> {
  readonly cleanedText: string;

  constructor(text: string) {
    this.cleanedText = cleanText(text);
  }

  [Symbol.iterator](): Iterator<Sentence> {
    return iterateSentences(this.cleanedText);
  }

  toArray(): Sentence[] {
    return Array.from(this);
  }
}

export function splitSentences(text: string): SentenceSequence {
  return new SentenceSequence(text);
}

export function* takeSentences(sentences: Iterable<Sentence>, limit: number): Generator<Sentence> {
  if (limit <= 0) return;
  let taken = 0;
  for (const sentence of sentences) {
    yield sentence;
    taken++;
    if (taken >= limit) return;
  }
}
