/**
 * RAG Pipeline
 *
 * Orchestrates both halves of the system:
 * - ingest: discover files, extract, chunk, embed in one batch, upsert
 * - answer: guard, embed query, search, rerank, build prompt, generate, cite
 *
 * Capabilities are injected so tests and offline runs can swap any of them.
 */

import { ConfigurationError, toErrorMessage } from '@/lib/errors';
import { SlidingWindowRateLimiter } from '@/lib/rate-limit';
import {
  createRequestContext,
  createRequestLogger,
  loggers,
  logIngestStep,
  logRagStep,
  Timer,
  type Logger,
} from '@/lib/logger';
import type { Settings } from '@/lib/config';
import {
  extractSourceUnits,
  listSupportedFiles,
  type SourceFile,
  type SourceUnit,
} from '@/lib/parsers';
import {
  QueryGuardrail,
  buildContext,
  buildRAGSystemPrompt,
  buildRAGUserPrompt,
  createGenerationProvider,
  type GenerationProvider,
} from '@/lib/llm';
import { ChunkCounter, chunkSourceUnits, type Chunk } from './chunker';
import { extractCitations, type Citation } from './citations';
import { createEmbeddingProvider, type EmbeddingProvider } from './embeddings';
import { createRerankProvider, rerankPassages, type RerankProvider } from './rerank';
import {
  createVectorStore,
  type ChunkMetadata,
  type SearchFilters,
  type VectorStore,
} from './vector-store';
import { BLOCKED_ANSWER, NO_RESULTS_ANSWER } from './config';

// =============================================================================
// Types
// =============================================================================

export interface IngestSuccess {
  status: 'success';
  filesProcessed: number;
  chunksCreated: number;
  documentsUpserted: number;
  elapsedSeconds: number;
}

export interface IngestFailure {
  status: 'error';
  error: string;
  filesProcessed: number;
}

export type IngestResult = IngestSuccess | IngestFailure;

export type AnswerStatus = 'success' | 'blocked' | 'no_results';

export interface BlockedUsage {
  error: 'blocked_content';
}

export interface NoResultsUsage {
  retrievalTimeMs: number;
  numRetrieved: 0;
}

export interface AnswerUsage {
  totalLatencyMs: number;
  retrievalTimeMs: number;
  rerankTimeMs: number;
  llmTimeMs: number;
  tokensPrompt: number;
  tokensCompletion: number;
  model: string;
  numRetrieved: number;
  numReranked: number;
}

interface AnswerBase {
  answer: string;
  citations: Citation[];
}

export type AnswerResult =
  | (AnswerBase & { status: 'blocked'; usage: BlockedUsage })
  | (AnswerBase & { status: 'no_results'; usage: NoResultsUsage })
  | (AnswerBase & { status: 'success'; usage: AnswerUsage });

export interface PipelineStats {
  totalDocuments: number;
  collection: string;
  embeddingsProvider: string;
  llmModel: string;
  reranker: string;
}

export interface AnswerOptions {
  topK?: number;
  filters?: SearchFilters;
  /** Attached to security log events */
  clientId?: string;
}

export interface RAGPipelineDeps {
  settings: Settings;
  embeddings: EmbeddingProvider;
  vectorStore: VectorStore;
  reranker: RerankProvider;
  generator: GenerationProvider;
  guardrail?: QueryGuardrail;
  /** Applied to answer() calls that carry a clientId */
  rateLimiter?: SlidingWindowRateLimiter;
  logger?: Logger;
}

// =============================================================================
// RAG Pipeline Class
// =============================================================================

export class RAGPipeline {
  private readonly settings: Settings;
  private readonly embeddings: EmbeddingProvider;
  private readonly vectorStore: VectorStore;
  private readonly reranker: RerankProvider;
  private readonly generator: GenerationProvider;
  private readonly guardrail: QueryGuardrail;
  private readonly rateLimiter: SlidingWindowRateLimiter | null;
  private readonly log: Logger;
  private initialization: Promise<void> | null = null;

  constructor(deps: RAGPipelineDeps) {
    this.settings = deps.settings;
    this.embeddings = deps.embeddings;
    this.vectorStore = deps.vectorStore;
    this.reranker = deps.reranker;
    this.generator = deps.generator;
    this.guardrail = deps.guardrail ?? QueryGuardrail.fromSettings(deps.settings);
    this.rateLimiter = deps.rateLimiter ?? null;
    this.log = (deps.logger ?? loggers.rag).child({ service: 'RAGPipeline' });
  }

  /**
   * Create the collection for the embedding dimension. Runs once; a failed
   * attempt is retried on the next call.
   */
  initialize(): Promise<void> {
    if (!this.initialization) {
      this.initialization = this.vectorStore
        .ensureCollection(this.embeddings.dimension())
        .then(() => {
          this.log.info(
            {
              event: 'pipeline_initialized',
              collection: this.settings.vectorStore.collection,
              dimension: this.embeddings.dimension(),
              store: this.vectorStore.name,
            },
            'RAG pipeline initialized'
          );
        })
        .catch((error: unknown) => {
          this.initialization = null;
          throw error;
        });
    }
    return this.initialization;
  }

  // ===========================================================================
  // Ingestion
  // ===========================================================================

  /**
   * Ingest every supported file directly inside a directory.
   * Configuration problems come back as an error result; capability
   * failures (embedding, upsert) are thrown.
   */
  async ingest(directory: string = this.settings.paths.docsDir): Promise<IngestResult> {
    const ctx = createRequestContext({ operation: 'ingest' });
    const log = createRequestLogger(ctx, this.log);
    const timer = new Timer();

    log.info({ event: 'ingest_start', directory }, `Starting document ingestion from ${directory}`);

    let files: SourceFile[];
    try {
      files = await listSupportedFiles(directory);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        log.error({ event: 'ingest_failed', directory }, error.message);
        return { status: 'error', error: error.message, filesProcessed: 0 };
      }
      throw error;
    }

    logIngestStep(log, 'discover', { files: files.length });
    if (files.length === 0) {
      log.warn({ event: 'ingest_failed', directory }, 'No PDF, DOCX or TXT files found');
      return { status: 'error', error: 'No documents found', filesProcessed: 0 };
    }

    await this.initialize();

    // 1. Extract and chunk each file
    timer.mark('chunking');
    const counter = new ChunkCounter();
    const chunks: Chunk[] = [];

    for (const file of files) {
      const units: SourceUnit[] = [];
      for await (const unit of extractSourceUnits(file.path, file.format)) {
        units.push(unit);
      }
      if (units.length === 0) continue;

      const fileChunks = chunkSourceUnits(units, counter, {
        chunkSize: this.settings.pipeline.chunkSize,
        chunkOverlap: this.settings.pipeline.chunkOverlap,
      });
      chunks.push(...fileChunks);
      logIngestStep(log, 'chunk', { file: file.path, units: units.length, chunks: fileChunks.length });
    }
    timer.measure('chunking');

    if (chunks.length === 0) {
      log.warn({ event: 'ingest_failed', files: files.length }, 'No text chunks extracted from documents');
      return { status: 'error', error: 'No content extracted', filesProcessed: files.length };
    }

    // 2. Embed all chunk texts in one call
    timer.mark('embedding');
    const texts = chunks.map((chunk) => chunk.text);
    const vectors = await this.embeddings.embedBatch(texts);
    logIngestStep(log, 'embed', { chunks: vectors.length, duration_ms: timer.measure('embedding') });

    // 3. Upsert
    timer.mark('upsert');
    const metadata = chunks.map(toChunkMetadata);
    const upserted = await this.vectorStore.upsert(texts, vectors, metadata);
    logIngestStep(log, 'upsert', { chunks: upserted, duration_ms: timer.measure('upsert') });

    const result: IngestSuccess = {
      status: 'success',
      filesProcessed: files.length,
      chunksCreated: chunks.length,
      documentsUpserted: upserted,
      elapsedSeconds: Math.round(timer.elapsed() / 10) / 100,
    };

    log.info({ event: 'ingest_complete', ...result, ...timer.getAllDurations() }, 'Ingestion complete');
    return result;
  }

  // ===========================================================================
  // Answering
  // ===========================================================================

  /**
   * Answer a question from the indexed documents.
   *
   * @throws RateLimitError when the client is over its request limit
   * @throws VectorStoreError when search fails
   * @throws GenerationError when every generation attempt fails
   */
  async answer(query: string, options: AnswerOptions = {}): Promise<AnswerResult> {
    const ctx = createRequestContext({ operation: 'answer', clientId: options.clientId });
    const log = createRequestLogger(ctx, this.log);
    const timer = new Timer();
    const topK = options.topK ?? this.settings.pipeline.topK;

    if (options.clientId && this.rateLimiter) {
      this.rateLimiter.consume(options.clientId);
    }

    // 1. Guardrail
    const sanitized = this.guardrail.sanitize(query, options.clientId);
    if (!sanitized.isSafe) {
      log.info({ event: 'query_blocked', reason: sanitized.reason }, 'Query blocked by guardrail');
      return {
        answer: BLOCKED_ANSWER,
        citations: [],
        usage: { error: 'blocked_content' },
        status: 'blocked',
      };
    }
    const safeQuery = sanitized.query;

    await this.initialize();

    // 2. Embed query
    timer.mark('embedding');
    const queryVector = await this.embeddings.embedOne(safeQuery);
    logRagStep(log, 'embedding', { duration_ms: timer.measure('embedding') });

    // 3. Retrieve
    timer.mark('retrieval');
    const retrieved = await this.vectorStore.search(queryVector, topK, options.filters);
    const retrievalTimeMs = timer.measure('retrieval');
    logRagStep(log, 'retrieval', { duration_ms: retrievalTimeMs, chunks: retrieved.length });

    if (retrieved.length === 0) {
      return {
        answer: NO_RESULTS_ANSWER,
        citations: [],
        usage: { retrievalTimeMs, numRetrieved: 0 },
        status: 'no_results',
      };
    }

    // 4. Rerank
    timer.mark('reranking');
    const reranked = await rerankPassages(
      this.reranker,
      safeQuery,
      retrieved,
      this.settings.pipeline.rerankTopK
    );
    const rerankTimeMs = timer.measure('reranking');
    logRagStep(log, 'reranking', { duration_ms: rerankTimeMs, chunks: reranked.length });

    // 5. Generate
    const context = buildContext(reranked, this.settings.guardrails.maxContextChars);
    timer.mark('generation');
    const generation = await this.generator.generate(buildRAGUserPrompt(safeQuery, context), {
      systemPrompt: buildRAGSystemPrompt(),
    });
    const llmTimeMs = timer.measure('generation');
    logRagStep(log, 'generation', {
      duration_ms: llmTimeMs,
      tokens: generation.promptTokens + generation.completionTokens,
      model: generation.model,
    });

    // 6. Cite
    const citations = extractCitations(reranked);
    logRagStep(log, 'citation', { chunks: citations.length });

    const usage: AnswerUsage = {
      totalLatencyMs: timer.elapsed(),
      retrievalTimeMs,
      rerankTimeMs,
      llmTimeMs,
      tokensPrompt: generation.promptTokens,
      tokensCompletion: generation.completionTokens,
      model: generation.model,
      numRetrieved: retrieved.length,
      numReranked: reranked.length,
    };

    log.info({ event: 'answer_complete', ...usage }, 'Answer generated');

    return { answer: generation.answer, citations, usage, status: 'success' };
  }

  // ===========================================================================
  // Collection Management
  // ===========================================================================

  /**
   * Number of indexed chunks; 0 when the index cannot be reached.
   */
  async collectionDocumentCount(): Promise<number> {
    try {
      return await this.vectorStore.count();
    } catch (error) {
      this.log.error(
        { event: 'count_failed', error: toErrorMessage(error) },
        'Failed to count indexed documents'
      );
      return 0;
    }
  }

  async stats(): Promise<PipelineStats> {
    return {
      totalDocuments: await this.collectionDocumentCount(),
      collection: this.settings.vectorStore.collection,
      embeddingsProvider: this.embeddings.name,
      llmModel: this.generator.model,
      reranker: this.reranker.name,
    };
  }

  /**
   * Drop every indexed chunk and re-create the empty collection.
   */
  async resetCollection(): Promise<void> {
    await this.vectorStore.drop();
    this.initialization = null;
    await this.initialize();
    this.log.warn(
      { event: 'collection_reset', collection: this.settings.vectorStore.collection },
      'Collection reset'
    );
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function toChunkMetadata(chunk: Chunk): ChunkMetadata {
  return {
    docId: `${chunk.title}_${chunk.sourceUnitIndex}`,
    title: chunk.title,
    section: chunk.section,
    page: chunk.sourceUnitIndex,
    sourcePath: chunk.sourcePath,
    chunkIndex: chunk.chunkIndex,
  };
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Wire the pipeline from settings.
 */
export function createRAGPipeline(settings: Settings): RAGPipeline {
  return new RAGPipeline({
    settings,
    embeddings: createEmbeddingProvider(settings),
    vectorStore: createVectorStore(settings),
    reranker: createRerankProvider(settings),
    generator: createGenerationProvider(settings),
    rateLimiter: new SlidingWindowRateLimiter(settings.guardrails.rateLimitPerMinute),
  });
}
