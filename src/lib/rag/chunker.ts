/**
 * Hierarchical Chunker
 *
 * Splits source units into overlapping chunks for RAG retrieval, carrying
 * the most recent heading as the chunk's section label. Long sections are
 * cut on sentence boundaries where one is close to the window end.
 */

import { ConfigurationError } from '@/lib/errors';
import type { SourceUnit } from '@/lib/parsers';
import { HEADING_MAX_LENGTH, SENTENCE_SEARCH_WINDOW } from './config';

// =============================================================================
// Types
// =============================================================================

export interface Chunk {
  text: string;
  title: string;
  /** Most recent heading, '' before the first one */
  section: string;
  sourceUnitIndex: number;
  sourcePath: string;
  /** Position in the whole ingest batch */
  chunkIndex: number;
}

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

/**
 * Running chunk_index for one ingest batch. Create one per ingest call and
 * pass it to every chunkSourceUnits() call in that batch.
 */
export class ChunkCounter {
  private next = 0;

  take(): number {
    return this.next++;
  }

  get count(): number {
    return this.next;
  }
}

// =============================================================================
// Default Options
// =============================================================================

const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  chunkSize: 800,
  chunkOverlap: 150,
};

// =============================================================================
// Heading Detection
// =============================================================================

/**
 * Upper-case in the sense of "has letters and none of them are lower-case".
 */
function isUpperCase(line: string): boolean {
  return line === line.toUpperCase() && line !== line.toLowerCase();
}

/**
 * A short line ending with ':', written in capitals, or starting with '#'.
 */
export function isHeadingCandidate(line: string): boolean {
  const trimmed = line.trim();
  if (!trimmed || trimmed.length >= HEADING_MAX_LENGTH) {
    return false;
  }
  return trimmed.endsWith(':') || isUpperCase(trimmed) || trimmed.startsWith('#');
}

// =============================================================================
// Size Splitter
// =============================================================================

function assertChunkOptions({ chunkSize, chunkOverlap }: ChunkOptions): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new ConfigurationError(`chunkOverlap must be a non-negative integer, got ${chunkOverlap}`);
  }
  if (chunkOverlap >= chunkSize) {
    throw new ConfigurationError(
      `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`
    );
  }
}

/**
 * Split text into windows of at most chunkSize characters, consecutive
 * windows sharing chunkOverlap characters. A window is shortened to end
 * just after the last ". " within its final 100 characters.
 *
 * @throws ConfigurationError when chunkOverlap >= chunkSize
 */
export function splitText(text: string, chunkSize: number, chunkOverlap: number): string[] {
  assertChunkOptions({ chunkSize, chunkOverlap });

  if (text.length <= chunkSize) {
    return text.trim() ? [text] : [];
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = start + chunkSize;

    if (end < text.length) {
      const searchStart = Math.max(start, end - SENTENCE_SEARCH_WINDOW);
      const lastPeriod = text.slice(searchStart, end).lastIndexOf('. ');
      if (lastPeriod !== -1) {
        end = searchStart + lastPeriod + 1;
      }
    }

    const chunk = text.slice(start, end).trim();
    if (chunk) {
      chunks.push(chunk);
    }

    if (end >= text.length) break;

    // A sentence cut close to start could otherwise move the window backwards
    const nextStart = end - chunkOverlap;
    start = nextStart > start ? nextStart : end;
  }

  return chunks;
}

// =============================================================================
// Hierarchical Chunking
// =============================================================================

/**
 * Chunk source units, tracking the latest heading within each unit.
 *
 * Body lines accumulate until a heading arrives; the accumulated text is then
 * split under the previous section label and the heading becomes the new
 * label. The heading line itself is not part of any chunk.
 */
export function chunkSourceUnits(
  units: Iterable<SourceUnit>,
  counter: ChunkCounter,
  options: Partial<ChunkOptions> = {}
): Chunk[] {
  const opts = { ...DEFAULT_CHUNK_OPTIONS, ...options };
  assertChunkOptions(opts);

  const chunks: Chunk[] = [];

  for (const unit of units) {
    let section = '';
    let body: string[] = [];

    const flush = () => {
      if (body.length === 0) return;
      for (const text of splitText(body.join(' '), opts.chunkSize, opts.chunkOverlap)) {
        chunks.push({
          text,
          title: unit.title,
          section,
          sourceUnitIndex: unit.pageIndex,
          sourcePath: unit.sourcePath,
          chunkIndex: counter.take(),
        });
      }
      body = [];
    };

    for (const rawLine of unit.text.split('\n')) {
      const line = rawLine.trim();
      if (!line) continue;

      if (isHeadingCandidate(line)) {
        flush();
        section = line;
      } else {
        body.push(line);
      }
    }

    flush();
  }

  return chunks;
}

/**
 * Estimate token count (rough approximation: ~4 chars per token).
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
