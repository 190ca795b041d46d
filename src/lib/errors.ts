/**
 * Pipeline error types.
 *
 * Every failure that escapes the pipeline carries a machine-readable code so
 * callers (CLI scripts, an HTTP facade) can map it without string matching.
 */

export type RAGErrorCode =
  | 'configuration'
  | 'extraction'
  | 'batch_length_mismatch'
  | 'generation'
  | 'vector_store'
  | 'rate_limited';

export class RAGError extends Error {
  readonly code: RAGErrorCode;

  constructor(code: RAGErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RAGError';
    this.code = code;
  }
}

/**
 * Invalid settings, missing directories, impossible chunking parameters.
 */
export class ConfigurationError extends RAGError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('configuration', message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * A single document could not be read. Ingestion logs it and moves on.
 */
export class ExtractionError extends RAGError {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super('extraction', `Failed to extract text from ${filePath}: ${toErrorMessage(cause)}`, {
      cause,
    });
    this.name = 'ExtractionError';
    this.filePath = filePath;
  }
}

/**
 * texts, vectors and metadata handed to an upsert differ in length.
 */
export class BatchLengthMismatchError extends RAGError {
  constructor(lengths: { texts: number; vectors: number; metadata: number }) {
    super(
      'batch_length_mismatch',
      `texts, vectors and metadata must have the same length ` +
        `(texts=${lengths.texts}, vectors=${lengths.vectors}, metadata=${lengths.metadata})`
    );
    this.name = 'BatchLengthMismatchError';
  }
}

/**
 * Generation failed on every attempt.
 */
export class GenerationError extends RAGError {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super('generation', `Generation failed after ${attempts} attempt(s): ${toErrorMessage(cause)}`, {
      cause,
    });
    this.name = 'GenerationError';
    this.attempts = attempts;
  }
}

export class VectorStoreError extends RAGError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super('vector_store', `Vector store ${operation} failed: ${toErrorMessage(cause)}`, { cause });
    this.name = 'VectorStoreError';
    this.operation = operation;
  }
}

export class RateLimitError extends RAGError {
  readonly retryAfterMs: number;

  constructor(clientId: string, retryAfterMs: number) {
    super('rate_limited', `Rate limit exceeded for ${clientId}. Retry in ${retryAfterMs}ms.`);
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Normalise a thrown value into a loggable message.
 */
export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
