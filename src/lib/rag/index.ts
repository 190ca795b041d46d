/**
 * RAG Module Exports
 *
 * Provides all RAG pipeline functionality:
 * - Hierarchical chunking
 * - Embedding providers
 * - Vector index
 * - Reranking
 * - Citation mapping
 * - Complete RAG pipeline
 */

// Chunker
export {
  chunkSourceUnits,
  splitText,
  isHeadingCandidate,
  estimateTokens,
  ChunkCounter,
  type Chunk,
  type ChunkOptions,
} from './chunker';

// Embeddings
export {
  OpenAIEmbeddingProvider,
  HashingEmbeddingProvider,
  createEmbeddingProvider,
  DEFAULT_EMBEDDING_MODEL,
  OPENAI_EMBEDDING_DIMENSIONS,
  type EmbeddingProvider,
  type OpenAIEmbeddingConfig,
} from './embeddings';

// Vector index
export {
  PgVectorStore,
  InMemoryVectorStore,
  createVectorStore,
  normalizeFilters,
  cosineSimilarity,
  type ChunkMetadata,
  type IndexedDocument,
  type RetrievedPassage,
  type SearchFilters,
  type VectorStore,
} from './vector-store';

// Reranking
export {
  LexicalRerankProvider,
  CohereRerankProvider,
  createRerankProvider,
  rerankPassages,
  type RerankProvider,
} from './rerank';

// Citations
export {
  extractCitations,
  buildExcerpt,
  formatSourcesSection,
  type Citation,
} from './citations';

// Validation
export {
  answerRequestSchema,
  createAnswerRequestSchema,
  parseAnswerRequest,
  type AnswerRequest,
} from './validation';

// RAG Pipeline
export {
  RAGPipeline,
  createRAGPipeline,
  toChunkMetadata,
  type AnswerOptions,
  type AnswerResult,
  type AnswerStatus,
  type AnswerUsage,
  type IngestResult,
  type PipelineStats,
  type RAGPipelineDeps,
} from './service';
