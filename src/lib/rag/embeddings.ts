/**
 * Embedding Providers
 *
 * Map text to fixed-dimension vectors:
 * - OpenAIEmbeddingProvider: OpenAI embeddings API, batched requests
 * - HashingEmbeddingProvider: deterministic feature hashing, no network
 */

import OpenAI, { AzureOpenAI } from 'openai';
import { loggers, logExternalCall } from '@/lib/logger';
import { toErrorMessage } from '@/lib/errors';
import type { Settings } from '@/lib/config';

const log = loggers.external.child({ service: 'Embeddings' });

// =============================================================================
// Types
// =============================================================================

export interface EmbeddingProvider {
  readonly name: string;
  /** One vector per text, in input order; [] for [] */
  embedBatch(texts: string[]): Promise<number[][]>;
  embedOne(text: string): Promise<number[]>;
  dimension(): number;
}

export interface OpenAIEmbeddingConfig {
  /** Model name, or the deployment name on Azure */
  model: string;
  batchSize: number;
  /** Use the Azure OpenAI client instead of api.openai.com */
  azure?: {
    endpoint: string;
    apiVersion: string;
  };
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-large';
const MAX_BATCH_SIZE = 100;

/**
 * Output dimension per OpenAI embedding model.
 */
export const OPENAI_EMBEDDING_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-large': 3072,
  'text-embedding-3-small': 1536,
  'text-embedding-ada-002': 1536,
};
const FALLBACK_OPENAI_DIMENSION = 1536;

// =============================================================================
// OpenAI
// =============================================================================

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';
  private client: OpenAI;
  private service: 'openai' | 'azure';
  private model: string;
  private batchSize: number;

  constructor(apiKey: string, config: Partial<OpenAIEmbeddingConfig> = {}) {
    if (config.azure) {
      this.service = 'azure';
      this.client = new AzureOpenAI({
        apiKey,
        endpoint: config.azure.endpoint,
        apiVersion: config.azure.apiVersion,
      });
    } else {
      this.service = 'openai';
      this.client = new OpenAI({ apiKey });
    }
    this.model = config.model ?? DEFAULT_EMBEDDING_MODEL;
    this.batchSize = Math.min(config.batchSize ?? MAX_BATCH_SIZE, MAX_BATCH_SIZE);
  }

  /**
   * Generate embeddings for many texts, 100 per request.
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const allEmbeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const start = Date.now();

      try {
        const response = await this.client.embeddings.create({
          model: this.model,
          input: batch,
        });

        // Ensure embeddings are in the same order as input
        const sortedData = [...response.data].sort((a, b) => a.index - b.index);
        allEmbeddings.push(...sortedData.map((d) => d.embedding));

        logExternalCall(log, this.service, 'embeddings.create', {
          duration_ms: Date.now() - start,
          tokens: response.usage.total_tokens,
          model: this.model,
        });
      } catch (error) {
        logExternalCall(log, this.service, 'embeddings.create', {
          duration_ms: Date.now() - start,
          model: this.model,
          error: toErrorMessage(error),
        });
        throw error;
      }
    }

    return allEmbeddings;
  }

  /**
   * Generate embedding for a single text.
   */
  async embedOne(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  dimension(): number {
    return OPENAI_EMBEDDING_DIMENSIONS[this.model] ?? FALLBACK_OPENAI_DIMENSION;
  }

}

// =============================================================================
// Hashing
// =============================================================================

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * 32-bit FNV-1a hash.
 */
function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Bag-of-words feature hashing, L2-normalised. Texts sharing words get
 * positive cosine similarity; identical texts get identical vectors.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hashing';

  constructor(private readonly size: number) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new Error(`Embedding dimension must be a positive integer, got ${size}`);
    }
  }

  embedSync(text: string): number[] {
    const vector = new Array<number>(this.size).fill(0);
    const tokens = text.toLowerCase().match(TOKEN_PATTERN) ?? [];

    for (const token of tokens) {
      const hash = fnv1a(token);
      const sign = hash & 0x80000000 ? -1 : 1;
      vector[hash % this.size] += sign;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedSync(text));
  }

  async embedOne(text: string): Promise<number[]> {
    return this.embedSync(text);
  }

  dimension(): number {
    return this.size;
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Build the embedding provider selected in settings. With LLM_PROVIDER=azure
 * the Azure credentials are used; without any key the hashing provider is
 * used instead.
 */
export function createEmbeddingProvider(settings: Settings): EmbeddingProvider {
  const { embeddings, llm } = settings;

  if (embeddings.provider === 'openai') {
    if (llm.provider === 'azure' && llm.azure.apiKey && llm.azure.endpoint) {
      return new OpenAIEmbeddingProvider(llm.azure.apiKey, {
        model: embeddings.openaiModel,
        azure: { endpoint: llm.azure.endpoint, apiVersion: llm.azure.apiVersion },
      });
    }
    if (llm.openaiApiKey) {
      return new OpenAIEmbeddingProvider(llm.openaiApiKey, { model: embeddings.openaiModel });
    }
    log.warn(
      { event: 'embeddings_fallback', provider: 'hashing' },
      'OPENAI_API_KEY not set, using hashing embeddings'
    );
  }

  return new HashingEmbeddingProvider(embeddings.vectorSize);
}
