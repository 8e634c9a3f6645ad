import mammoth from 'mammoth';
import { extractionLogger } from '../logger';
import { DocumentDecodingError, UnprocessableEntityError, UnsupportedMediaTypeError } from '../errors';

export type DocumentFormat = 'pdf' | 'docx' | 'txt';

export interface ExtractedDocument {
  filename: string;
  format: DocumentFormat;
  text: string;
  pageCount: number | null;
}

export interface ExtractionOptions {
  mimeType?: string;
  minTextLength?: number;
}

const EXTENSION_TO_FORMAT: Record<string, DocumentFormat> = {
  pdf: 'pdf',
  docx: 'docx',
  txt: 'txt',
  text: 'txt',
};

const MIME_TO_FORMAT: Record<string, DocumentFormat> = {
  'application/pdf': 'pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'docx',
  'text/plain': 'txt',
};

type PdfjsModule = typeof import('pdfjs-dist/legacy/build/pdf.mjs');

let pdfjs: PdfjsModule | null = null;
async function getPdfjs(): Promise<PdfjsModule> {
  if (!pdfjs) {
    pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
  }
  return pdfjs;
}

export function detectFormat(filename: string, mimeType?: string): DocumentFormat {
  const dot = filename.lastIndexOf('.');
  const ext = dot >= 0 ? filename.slice(dot + 1).toLowerCase() : '';
  const byExtension = EXTENSION_TO_FORMAT[ext];
  if (byExtension) return byExtension;

  const baseMime = mimeType?.split(';')[0].trim().toLowerCase();
  const byMime = baseMime ? MIME_TO_FORMAT[baseMime] : undefined;
  if (byMime) return byMime;

  throw new UnsupportedMediaTypeError(
    `Unsupported document type for "${filename}"; expected a PDF, DOCX or TXT file`
  );
}

async function extractPdf(buffer: Buffer): Promise<{ text: string; pageCount: number }> {
  const pdfjsLib = await getPdfjs();
  const pdf = await pdfjsLib.getDocument({
    data: new Uint8Array(buffer),
    isEvalSupported: false,
    useSystemFonts: true,
  }).promise;

  const pages: string[] = [];
  try {
    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const content = await page.getTextContent();
      const lines: string[] = [];
      let current = '';
      for (const item of content.items) {
        if (!('str' in item)) continue;
        current += item.str;
        if (item.hasEOL) {
          lines.push(current);
          current = '';
        } else if (item.str.length > 0) {
          current += ' ';
        }
      }
      if (current.trim()) lines.push(current);
      pages.push(lines.join('\n'));
    }
  } finally {
    await pdf.destroy();
  }

  return { text: pages.join('\n'), pageCount: pages.length };
}

async function extractDocx(buffer: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer });
  for (const message of result.messages) {
    extractionLogger.debug({ type: message.type, message: message.message }, 'DOCX conversion message');
  }
  return result.value;
}

function extractPlainText(buffer: Buffer): string {
  return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
}

/**
 * Pulls plain text out of an uploaded document. Decoding failures raise
 * DocumentDecodingError rather than yielding empty text, and text below
 * `minTextLength` characters is rejected as unanalysable.
 */
export async function extractText(
  buffer: Buffer,
  filename: string,
  options: ExtractionOptions = {}
): Promise<ExtractedDocument> {
  const format = detectFormat(filename, options.mimeType);
  const minTextLength = options.minTextLength ?? 50;
  const startTime = Date.now();

  let text: string;
  let pageCount: number | null = null;

  try {
    switch (format) {
      case 'pdf': {
        const pdf = await extractPdf(buffer);
        text = pdf.text;
        pageCount = pdf.pageCount;
        break;
      }
      case 'docx':
        text = await extractDocx(buffer);
        break;
      case 'txt':
        text = extractPlainText(buffer);
        break;
    }
  } catch (error) {
    extractionLogger.warn({ err: error, filename, format }, 'Document decoding failed');
    const reason = error instanceof Error ? error.message : String(error);
    throw new DocumentDecodingError(format, `Could not read ${format.toUpperCase()} document "${filename}": ${reason}`);
  }

  const length = text.trim().length;
  if (length < minTextLength) {
    throw new UnprocessableEntityError(
      `Extracted text is too short to analyse (${length} characters, minimum ${minTextLength})`
    );
  }

  extractionLogger.info(
    { filename, format, pageCount, textLength: text.length, durationMs: Date.now() - startTime },
    'Document text extracted'
  );

  return { filename, format, text, pageCount };
}
