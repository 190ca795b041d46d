/**
 * Text Extractor
 *
 * Turns a source document into ordered, page-like text units:
 * - PDF (.pdf): one unit per page with text
 * - Word (.docx): one unit per non-empty paragraph (page = paragraph ordinal)
 * - Plain text (.txt): split on form feeds, else on the box-drawing
 *   section separator, else the whole file
 */

import { readdir, readFile, stat } from 'fs/promises';
import path from 'path';
import mammoth from 'mammoth';
import { ConfigurationError, ExtractionError } from '@/lib/errors';
import { loggers, logIngestStep } from '@/lib/logger';
import {
  FORM_FEED,
  SECTION_SEPARATOR,
  SECTION_SEPARATOR_PROBE,
} from '@/lib/rag/config';

const log = loggers.ingest.child({ service: 'TextExtractor' });

// pdf-parse v2.x has a class-based API
// Use dynamic import to avoid type definition issues
interface PDFPageText {
  num: number;
  text: string;
}

interface PDFTextResult {
  text: string;
  pages?: PDFPageText[];
}

interface PDFParserInstance {
  load?(): Promise<void>;
  getText(): Promise<PDFTextResult | string>;
  destroy(): void | Promise<void>;
}

interface PDFParseConstructor {
  new (options: { data: Buffer }): PDFParserInstance;
}

let PDFParseClass: PDFParseConstructor | null = null;

async function getPDFParser(): Promise<PDFParseConstructor> {
  if (!PDFParseClass) {
    const mod = await import('pdf-parse');
    // Cast through unknown to avoid private property type conflicts
    PDFParseClass = (mod as unknown as { PDFParse: PDFParseConstructor }).PDFParse;
  }
  return PDFParseClass;
}

// =============================================================================
// Types
// =============================================================================

export type DocumentFormat = 'pdf' | 'docx' | 'txt';

/**
 * One page (PDF), paragraph (DOCX) or section (TXT) of a document.
 */
export interface SourceUnit {
  text: string;
  /** 1-based page, paragraph ordinal or section number */
  pageIndex: number;
  title: string;
  sourcePath: string;
}

export interface SourceFile {
  path: string;
  format: DocumentFormat;
}

export const SUPPORTED_EXTENSIONS = ['.pdf', '.docx', '.txt'] as const;
export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

const FORMAT_BY_EXTENSION: Record<SupportedExtension, DocumentFormat> = {
  '.pdf': 'pdf',
  '.docx': 'docx',
  '.txt': 'txt',
};

const FORMAT_ORDER: DocumentFormat[] = ['pdf', 'docx', 'txt'];

// =============================================================================
// File Type Detection
// =============================================================================

/**
 * Get file extension from filename.
 */
export function getFileExtension(filename: string): string {
  const lastDot = filename.lastIndexOf('.');
  if (lastDot === -1) return '';
  return filename.slice(lastDot).toLowerCase();
}

function isSupportedExtension(ext: string): ext is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((supported) => supported === ext);
}

/**
 * Map a filename to its document format, or null when unsupported.
 */
export function detectDocumentFormat(filename: string): DocumentFormat | null {
  const ext = getFileExtension(filename);
  return isSupportedExtension(ext) ? FORMAT_BY_EXTENSION[ext] : null;
}

/**
 * Document title: the file name without its extension.
 */
export function titleFromPath(filePath: string): string {
  return path.parse(filePath).name;
}

/**
 * List supported files directly inside a directory (no recursion),
 * PDFs first, then DOCX, then TXT, each group in name order.
 *
 * @throws ConfigurationError if the directory does not exist
 */
export async function listSupportedFiles(directory: string): Promise<SourceFile[]> {
  const info = await stat(directory).catch(() => null);
  if (!info || !info.isDirectory()) {
    throw new ConfigurationError(`Directory not found: ${directory}`);
  }

  const entries = await readdir(directory, { withFileTypes: true });
  const files: SourceFile[] = [];

  for (const entry of entries) {
    if (!entry.isFile()) continue;

    const format = detectDocumentFormat(entry.name);
    if (!format) {
      log.warn({ event: 'unsupported_file', file: entry.name }, 'Skipping unsupported file');
      continue;
    }
    files.push({ path: path.join(directory, entry.name), format });
  }

  return files.sort(
    (a, b) =>
      FORMAT_ORDER.indexOf(a.format) - FORMAT_ORDER.indexOf(b.format) ||
      a.path.localeCompare(b.path)
  );
}

// =============================================================================
// Parsers
// =============================================================================

function toUnits(texts: string[], title: string, sourcePath: string): SourceUnit[] {
  const units: SourceUnit[] = [];
  texts.forEach((raw, index) => {
    const text = raw.trim();
    if (text) {
      units.push({ text, pageIndex: index + 1, title, sourcePath });
    }
  });
  return units;
}

/**
 * Parse PDF bytes into one unit per page; blank pages are dropped.
 */
export async function parsePdfUnits(
  buffer: Buffer,
  title: string,
  sourcePath = ''
): Promise<SourceUnit[]> {
  const PDFParse = await getPDFParser();
  const parser = new PDFParse({ data: buffer });

  try {
    await parser.load?.();
    const result = await parser.getText();

    if (typeof result === 'string' || !result.pages?.length) {
      const text = typeof result === 'string' ? result : result.text;
      return toUnits([text], title, sourcePath);
    }

    const units: SourceUnit[] = [];
    for (const page of result.pages) {
      const text = page.text.trim();
      // Pages keep their real number even when earlier pages were blank
      if (text) {
        units.push({ text: page.text, pageIndex: page.num, title, sourcePath });
      }
    }
    return units;
  } finally {
    await parser.destroy();
  }
}

/**
 * Parse DOCX bytes into one unit per non-empty paragraph.
 *
 * The page index is the paragraph ordinal, not a printed page number.
 */
export async function parseDocxUnits(
  buffer: Buffer,
  title: string,
  sourcePath = ''
): Promise<SourceUnit[]> {
  const result = await mammoth.extractRawText({ buffer });
  // mammoth ends every paragraph with a blank line
  const paragraphs = result.value.replace(/\r\n/g, '\n').split('\n\n');
  return toUnits(paragraphs, title, sourcePath);
}

/**
 * Split plain text into sections.
 */
export function parseTextUnits(content: string, title: string, sourcePath = ''): SourceUnit[] {
  if (!content.trim()) {
    return [];
  }

  let sections: string[];
  if (content.includes(FORM_FEED)) {
    sections = content.split(FORM_FEED);
  } else if (content.includes(SECTION_SEPARATOR_PROBE)) {
    sections = content.split(SECTION_SEPARATOR);
  } else {
    sections = [content];
  }

  return toUnits(sections, title, sourcePath);
}

// =============================================================================
// Main Extractor
// =============================================================================

async function readUnits(filePath: string, format: DocumentFormat): Promise<SourceUnit[]> {
  const title = titleFromPath(filePath);

  switch (format) {
    case 'pdf':
      return parsePdfUnits(await readFile(filePath), title, filePath);
    case 'docx':
      return parseDocxUnits(await readFile(filePath), title, filePath);
    case 'txt':
      return parseTextUnits(await readFile(filePath, 'utf-8'), title, filePath);
  }
}

/**
 * Lazily extract the source units of one file.
 *
 * Each iteration re-reads the file. A file that cannot be read or parsed
 * is logged and yields no units.
 */
export function extractSourceUnits(
  filePath: string,
  format: DocumentFormat
): AsyncIterable<SourceUnit> {
  return {
    async *[Symbol.asyncIterator]() {
      let units: SourceUnit[];
      try {
        units = await readUnits(filePath, format);
      } catch (error) {
        const failure = new ExtractionError(filePath, error);
        logIngestStep(log, 'extract', { file: filePath, error: failure.message });
        return;
      }

      logIngestStep(log, 'extract', { file: filePath, units: units.length });
      yield* units;
    },
  };
}
