/**
 * Citation Service
 *
 * Maps the passages an answer was generated from to source references:
 * distinct (title, page) pairs in rank order, at most three.
 */

import {
  CITATION_EXCERPT_LENGTH,
  CITATION_EXCERPT_SUFFIX,
  MAX_CITATIONS,
} from './config';
import type { RetrievedPassage } from './vector-store';

// =============================================================================
// Types
// =============================================================================

export interface Citation {
  docId: string;
  title: string;
  section: string;
  page: number;
  /** Rerank score when the passage was reranked, else similarity */
  score: number;
  excerpt: string;
}

// =============================================================================
// Citation Building
// =============================================================================

/**
 * First 200 characters of the passage, always followed by "...".
 */
export function buildExcerpt(text: string): string {
  return text.slice(0, CITATION_EXCERPT_LENGTH) + CITATION_EXCERPT_SUFFIX;
}

/**
 * Build citations from ranked passages. Passages repeating an earlier
 * (title, page) pair are skipped.
 */
export function extractCitations(
  passages: RetrievedPassage[],
  limit: number = MAX_CITATIONS
): Citation[] {
  const citations: Citation[] = [];
  const seen = new Set<string>();

  for (const passage of passages) {
    if (citations.length >= limit) break;

    const key = JSON.stringify([passage.title, passage.page]);
    if (seen.has(key)) continue;
    seen.add(key);

    citations.push({
      docId: passage.docId,
      title: passage.title,
      section: passage.section,
      page: passage.page,
      score: passage.rerankScore ?? passage.score,
      excerpt: buildExcerpt(passage.text),
    });
  }

  return citations;
}

/**
 * Format citations as a "Fontes" list, one bullet per source.
 */
export function formatSourcesSection(citations: Citation[]): string {
  if (citations.length === 0) {
    return '';
  }
  const lines = citations.map((c) => `• ${c.title} (p. ${c.page})`);
  return `## Fontes\n${lines.join('\n')}`;
}
