/**
 * Application Settings
 *
 * Parsed once from environment variables with zod. Every field has a
 * default except DATABASE_URL, which the postgres vector store requires.
 */

import { z } from 'zod';
import { ConfigurationError } from '@/lib/errors';

// =============================================================================
// Schema
// =============================================================================

const intFromEnv = (fallback: number, min = 1) =>
  z.coerce.number({ invalid_type_error: 'must be a number' }).int().min(min).default(fallback);

export const settingsSchema = z
  .object({
    // LLM
    LLM_PROVIDER: z.enum(['openai', 'azure', 'dummy']).default('openai'),
    LLM_MODEL: z.string().min(1).default('gpt-4o-mini'),
    LLM_TEMPERATURE: z.coerce.number({ invalid_type_error: 'must be a number' }).min(0).max(2).default(0.1),
    LLM_MAX_TOKENS: intFromEnv(1500),
    LLM_TIMEOUT_MS: intFromEnv(30_000),
    LLM_MAX_ATTEMPTS: intFromEnv(3),
    OPENAI_API_KEY: z.string().default(''),
    AZURE_OPENAI_ENDPOINT: z.string().default(''),
    AZURE_OPENAI_API_KEY: z.string().default(''),
    AZURE_OPENAI_DEPLOYMENT: z.string().default('gpt-4o-mini'),
    AZURE_OPENAI_API_VERSION: z.string().default('2024-02-01'),

    // Embeddings
    EMBEDDINGS_PROVIDER: z.enum(['openai', 'hashing']).default('openai'),
    OPENAI_EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-large'),
    VECTOR_SIZE: intFromEnv(1024),

    // Vector index
    VECTOR_STORE: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: z.string().default(''),
    VECTOR_COLLECTION: z
      .string()
      .regex(/^[a-z_][a-z0-9_]*$/, 'must be a lower-case SQL identifier')
      .default('insurance_products'),

    // Reranking
    RERANKER: z.enum(['lexical', 'cohere']).default('lexical'),
    COHERE_API_KEY: z.string().default(''),
    COHERE_RERANK_MODEL: z.string().default('rerank-multilingual-v3.0'),

    // Pipeline
    TOP_K: intFromEnv(6),
    RERANK_TOP_K: intFromEnv(3),
    CHUNK_SIZE: intFromEnv(800),
    CHUNK_OVERLAP: intFromEnv(150, 0),

    // Guardrails
    MAX_CONTEXT_CHARS: intFromEnv(12_000),
    MAX_QUERY_LENGTH: intFromEnv(500),
    BLOCKED_TERMS: z.string().default('segredo;credencial;senha;password;token;api_key;hack;inject'),
    RATE_LIMIT_PER_MINUTE: intFromEnv(20),

    // Data paths
    DATA_DIR: z.string().default('/data'),
    DOCS_DIR: z.string().default('/data/pdfs'),
    GROUNDTRUTH_DIR: z.string().default('/data/groundtruth'),
  })
  .superRefine((value, ctx) => {
    if (value.CHUNK_OVERLAP >= value.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHUNK_OVERLAP'],
        message: `must be smaller than CHUNK_SIZE (${value.CHUNK_SIZE})`,
      });
    }
    if (value.VECTOR_STORE === 'postgres' && !value.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'is required when VECTOR_STORE=postgres',
      });
    }
  });

type RawSettings = z.infer<typeof settingsSchema>;

// =============================================================================
// Types
// =============================================================================

export interface Settings {
  llm: {
    provider: RawSettings['LLM_PROVIDER'];
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    maxAttempts: number;
    openaiApiKey: string;
    azure: {
      endpoint: string;
      apiKey: string;
      deployment: string;
      apiVersion: string;
    };
  };
  embeddings: {
    provider: RawSettings['EMBEDDINGS_PROVIDER'];
    openaiModel: string;
    vectorSize: number;
  };
  vectorStore: {
    provider: RawSettings['VECTOR_STORE'];
    databaseUrl: string;
    collection: string;
  };
  reranker: {
    provider: RawSettings['RERANKER'];
    cohereApiKey: string;
    cohereModel: string;
  };
  pipeline: {
    topK: number;
    rerankTopK: number;
    chunkSize: number;
    chunkOverlap: number;
  };
  guardrails: {
    maxContextChars: number;
    maxQueryLength: number;
    blockedTerms: string;
    rateLimitPerMinute: number;
  };
  paths: {
    dataDir: string;
    docsDir: string;
    groundtruthDir: string;
  };
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Parse settings from an environment map (defaults to process.env).
 * Empty strings count as unset so `FOO=` in a .env file keeps the default.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }

  const parsed = settingsSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'settings'} ${issue.message}`
    );
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const raw = parsed.data;
  return {
    llm: {
      provider: raw.LLM_PROVIDER,
      model: raw.LLM_MODEL,
      temperature: raw.LLM_TEMPERATURE,
      maxTokens: raw.LLM_MAX_TOKENS,
      timeoutMs: raw.LLM_TIMEOUT_MS,
      maxAttempts: raw.LLM_MAX_ATTEMPTS,
      openaiApiKey: raw.OPENAI_API_KEY,
      azure: {
        endpoint: raw.AZURE_OPENAI_ENDPOINT,
        apiKey: raw.AZURE_OPENAI_API_KEY,
        deployment: raw.AZURE_OPENAI_DEPLOYMENT,
        apiVersion: raw.AZURE_OPENAI_API_VERSION,
      },
    },
    embeddings: {
      provider: raw.EMBEDDINGS_PROVIDER,
      openaiModel: raw.OPENAI_EMBEDDING_MODEL,
      vectorSize: raw.VECTOR_SIZE,
    },
    vectorStore: {
      provider: raw.VECTOR_STORE,
      databaseUrl: raw.DATABASE_URL,
      collection: raw.VECTOR_COLLECTION,
    },
    reranker: {
      provider: raw.RERANKER,
      cohereApiKey: raw.COHERE_API_KEY,
      cohereModel: raw.COHERE_RERANK_MODEL,
    },
    pipeline: {
      topK: raw.TOP_K,
      rerankTopK: raw.RERANK_TOP_K,
      chunkSize: raw.CHUNK_SIZE,
      chunkOverlap: raw.CHUNK_OVERLAP,
    },
    guardrails: {
      maxContextChars: raw.MAX_CONTEXT_CHARS,
      maxQueryLength: raw.MAX_QUERY_LENGTH,
      blockedTerms: raw.BLOCKED_TERMS,
      rateLimitPerMinute: raw.RATE_LIMIT_PER_MINUTE,
    },
    paths: {
      dataDir: raw.DATA_DIR,
      docsDir: raw.DOCS_DIR,
      groundtruthDir: raw.GROUNDTRUTH_DIR,
    },
  };
}

/**
 * Split the semicolon-delimited blocked term list.
 */
export function getBlockedTermsList(blockedTerms: string): string[] {
  return blockedTerms
    .split(';')
    .map((term) => term.trim().toLowerCase())
    .filter((term) => term.length > 0);
}
