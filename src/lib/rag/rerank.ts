/**
 * Reranking
 *
 * Scores (query, passage) pairs and reorders retrieved passages by that
 * score. A failing reranker never fails the request: retrieval order is
 * kept instead.
 */

import { z } from 'zod';
import { loggers, logExternalCall } from '@/lib/logger';
import { toErrorMessage } from '@/lib/errors';
import type { Settings } from '@/lib/config';
import { SINGLE_PASSAGE_RERANK_SCORE } from './config';
import type { RetrievedPassage } from './vector-store';

const log = loggers.rag.child({ service: 'Reranker' });

// =============================================================================
// Types
// =============================================================================

export interface RerankProvider {
  readonly name: string;
  /** One relevance score per passage, higher is better */
  score(query: string, passages: string[]): Promise<number[]>;
}

// =============================================================================
// Lexical
// =============================================================================

const MIN_TERM_LENGTH = 3;

function queryTerms(query: string): string[] {
  const terms = query
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((term) => term.length >= MIN_TERM_LENGTH);
  return [...new Set(terms)];
}

/**
 * Share of distinct query terms (3+ characters) that occur in the passage.
 */
export class LexicalRerankProvider implements RerankProvider {
  readonly name = 'lexical';

  async score(query: string, passages: string[]): Promise<number[]> {
    const terms = queryTerms(query);
    if (terms.length === 0) {
      return passages.map(() => 0);
    }

    return passages.map((passage) => {
      const lower = passage.toLowerCase();
      const matched = terms.filter((term) => lower.includes(term)).length;
      return matched / terms.length;
    });
  }
}

// =============================================================================
// Cohere
// =============================================================================

const cohereResponseSchema = z.object({
  results: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      relevance_score: z.number(),
    })
  ),
});

export interface CohereRerankOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Cohere Rerank API provider.
 */
export class CohereRerankProvider implements RerankProvider {
  readonly name = 'cohere';
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: CohereRerankOptions) {
    this.baseUrl = options.baseUrl ?? 'https://api.cohere.ai/v1';
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async score(query: string, passages: string[]): Promise<number[]> {
    const start = Date.now();

    const response = await fetch(`${this.baseUrl}/rerank`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.options.apiKey}`,
      },
      body: JSON.stringify({
        model: this.options.model,
        query,
        documents: passages,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text();
      logExternalCall(log, 'cohere', 'rerank', {
        duration_ms: Date.now() - start,
        status: response.status,
        error: errorText,
      });
      throw new Error(`Cohere rerank API error: ${response.status} ${errorText}`);
    }

    const data = cohereResponseSchema.parse(await response.json());
    logExternalCall(log, 'cohere', 'rerank', {
      duration_ms: Date.now() - start,
      status: response.status,
      model: this.options.model,
    });

    // Passages the API leaves out rank last
    const scores = passages.map(() => Number.NEGATIVE_INFINITY);
    for (const result of data.results) {
      if (result.index < scores.length) {
        scores[result.index] = result.relevance_score;
      }
    }
    return scores;
  }
}

// =============================================================================
// Reranking
// =============================================================================

/**
 * Reorder passages by reranker score and keep the best topK.
 *
 * - no passages: []
 * - one passage: scored SINGLE_PASSAGE_RERANK_SCORE without calling the provider
 * - provider failure or wrong score count: retrieval order, truncated to topK
 */
export async function rerankPassages(
  provider: RerankProvider,
  query: string,
  passages: RetrievedPassage[],
  topK: number
): Promise<RetrievedPassage[]> {
  if (passages.length === 0) {
    return [];
  }

  if (passages.length === 1) {
    return [{ ...passages[0], rerankScore: SINGLE_PASSAGE_RERANK_SCORE }];
  }

  let scores: number[];
  try {
    scores = await provider.score(
      query,
      passages.map((p) => p.text)
    );
    if (scores.length !== passages.length) {
      throw new Error(`expected ${passages.length} scores, got ${scores.length}`);
    }
  } catch (error) {
    log.warn(
      { event: 'rerank_fallback', provider: provider.name, error: toErrorMessage(error) },
      'Reranking failed, keeping retrieval order'
    );
    return passages.slice(0, topK);
  }

  // Array.prototype.sort is stable, so ties keep retrieval order
  return passages
    .map((passage, i) => ({ ...passage, rerankScore: scores[i] }))
    .sort((a, b) => b.rerankScore - a.rerankScore)
    .slice(0, topK);
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Build the reranker selected in settings. Cohere without an API key
 * falls back to the lexical reranker.
 */
export function createRerankProvider(settings: Settings): RerankProvider {
  const { provider, cohereApiKey, cohereModel } = settings.reranker;

  if (provider === 'cohere') {
    if (cohereApiKey) {
      return new CohereRerankProvider({
        apiKey: cohereApiKey,
        model: cohereModel,
        timeoutMs: settings.llm.timeoutMs,
      });
    }
    log.warn(
      { event: 'reranker_fallback', provider: 'lexical' },
      'COHERE_API_KEY not set, using lexical reranker'
    );
  }

  return new LexicalRerankProvider();
}
