/**
 * RAG Configuration Constants
 *
 * Fixed pipeline parameters and user-facing messages. Tunable values
 * (top-k, chunk size, context budget) live in Settings; these do not change
 * between deployments.
 */

// =============================================================================
// Chunking
// =============================================================================

/**
 * Lines shorter than this may be headings.
 */
export const HEADING_MAX_LENGTH = 80;

/**
 * How far back from a window end the splitter looks for ". ".
 */
export const SENTENCE_SEARCH_WINDOW = 100;

// =============================================================================
// Text Extraction
// =============================================================================

/**
 * Page break in plain-text exports.
 */
export const FORM_FEED = '\f';

/**
 * Marker whose presence selects the box-drawing separator split.
 */
export const SECTION_SEPARATOR_PROBE = '═══';

/**
 * Section separator used by the plain-text product sheets (63 × U+2550).
 */
export const SECTION_SEPARATOR = '═'.repeat(63);

// =============================================================================
// Retrieval & Reranking
// =============================================================================

/**
 * Score given to a lone retrieved passage without calling the reranker.
 */
export const SINGLE_PASSAGE_RERANK_SCORE = 1.0;

/**
 * Filter keys the vector index understands. Anything else is ignored.
 */
export const RECOGNIZED_FILTER_KEYS = ['product', 'doc_id'] as const;

// =============================================================================
// Citations
// =============================================================================

export const MAX_CITATIONS = 3;
export const CITATION_EXCERPT_LENGTH = 200;
export const CITATION_EXCERPT_SUFFIX = '...';

// =============================================================================
// Context Assembly
// =============================================================================

export const CONTEXT_TRUNCATION_MARKER = '\n\n[... contexto truncado ...]';

// =============================================================================
// Generation Retry
// =============================================================================

export const GENERATION_RETRY_BASE_DELAY_MS = 2_000;
export const GENERATION_RETRY_MAX_DELAY_MS = 10_000;

// =============================================================================
// Fixed Answers
// =============================================================================

export const BLOCKED_ANSWER =
  'Desculpe, a sua pergunta contém conteúdo bloqueado. Por favor, reformule a pergunta.';

export const NO_RESULTS_ANSWER =
  'Não encontrei informação relevante na base de conhecimento para responder à sua pergunta. ' +
  'Por favor, tente reformular ou fazer uma pergunta sobre produtos de seguro.';

export const DUMMY_ANSWER =
  'Esta é uma resposta de teste. O provider real não está configurado.';
