/**
 * Structured Logging System
 *
 * Pino-based logging with:
 * - Request tracing via traceId
 * - Environment-based configuration
 * - Sensitive data sanitization
 * - Layer-specific child loggers
 * - Timing utilities
 */

import pino, { Logger, LoggerOptions } from 'pino';
import { randomUUID } from 'crypto';

// =============================================================================
// Configuration
// =============================================================================

/**
 * Pino options from LOG_LEVEL and LOG_FORMAT. Without LOG_FORMAT the output
 * is JSON in production and pretty-printed elsewhere.
 */
export function resolveLoggerOptions(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const level = env.LOG_LEVEL || 'info';
  const format = env.LOG_FORMAT || (env.NODE_ENV === 'production' ? 'json' : 'pretty');

  return {
    level,
    // JSON lines for collectors, pretty print for terminals
    ...(format === 'json'
      ? {
          formatters: {
            level: (label: string) => ({ level: label }),
          },
          timestamp: pino.stdTimeFunctions.isoTime,
        }
      : {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:HH:MM:ss',
              ignore: 'pid,hostname',
            },
          },
        }),
  };
}

// =============================================================================
// Main Logger Instance
// =============================================================================

/**
 * Root logger instance.
 * Use child loggers for specific contexts.
 */
export const logger: Logger = pino(resolveLoggerOptions());

// =============================================================================
// Request Context
// =============================================================================

export type PipelineOperation = 'ingest' | 'answer' | 'stats' | 'eval';

/**
 * Request context for tracing
 */
export interface RequestContext {
  traceId: string;
  operation?: PipelineOperation;
  clientId?: string;
  startTime: number;
}

/**
 * Generate a new request context with unique traceId
 */
export function createRequestContext(options?: {
  operation?: PipelineOperation;
  clientId?: string;
}): RequestContext {
  return {
    traceId: randomUUID(),
    operation: options?.operation,
    clientId: options?.clientId,
    startTime: Date.now(),
  };
}

/**
 * Create a child logger bound to a request context
 */
export function createRequestLogger(ctx: RequestContext, base: Logger = logger): Logger {
  return base.child({
    traceId: ctx.traceId,
    ...(ctx.operation && { operation: ctx.operation }),
    ...(ctx.clientId && { client: ctx.clientId }),
  });
}

// =============================================================================
// Layer-Specific Loggers
// =============================================================================

export type LogLayer = 'rag' | 'ingest' | 'db' | 'external' | 'security' | 'eval';

/**
 * Pre-configured layer loggers (without request context)
 */
export const loggers: Record<LogLayer, Logger> = {
  rag: logger.child({ layer: 'rag' }),
  ingest: logger.child({ layer: 'ingest' }),
  db: logger.child({ layer: 'db' }),
  external: logger.child({ layer: 'external' }),
  security: logger.child({ layer: 'security' }),
  eval: logger.child({ layer: 'eval' }),
};

// =============================================================================
// Sanitization Utilities
// =============================================================================

/**
 * Maximum length for text content in logs
 */
const MAX_TEXT_LENGTH = 200;

/**
 * Patterns for detecting sensitive data
 */
const SENSITIVE_PATTERNS = [
  /sk-[a-zA-Z0-9_-]{20,}/g, // OpenAI API keys
  /postgres(ql)?:\/\/[^@\s]+@/g, // Database URLs with credentials
  /Bearer [a-zA-Z0-9._-]+/g, // Bearer tokens
  /password[=:]\s*["']?[^"'\s]+/gi, // Password values
  /api[_-]?key[=:]\s*["']?[^"'\s]+/gi, // API key values
];

/**
 * Sanitize a string by redacting sensitive patterns
 */
export function sanitizeString(value: string): string {
  let sanitized = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }
  return sanitized;
}

/**
 * Truncate text content for logging
 */
export function truncateText(text: string, maxLength = MAX_TEXT_LENGTH): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength)}... (${text.length} chars total)`;
}

// =============================================================================
// Timing Utilities
// =============================================================================

/**
 * Timer class for tracking operation durations
 */
export class Timer {
  private startTime: number;
  private marks: Map<string, number> = new Map();
  private durations: Map<string, number> = new Map();

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = this.now();
  }

  /**
   * Mark the start of an operation
   */
  mark(name: string): void {
    this.marks.set(name, this.now());
  }

  /**
   * Record the duration since a mark
   */
  measure(name: string): number {
    const markTime = this.marks.get(name);
    if (markTime === undefined) {
      return 0;
    }
    const duration = this.now() - markTime;
    this.durations.set(name, duration);
    return duration;
  }

  /**
   * Get total elapsed time
   */
  elapsed(): number {
    return this.now() - this.startTime;
  }

  /**
   * Get all durations as an object
   */
  getAllDurations(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const [key, value] of this.durations) {
      result[`${key}_ms`] = value;
    }
    return result;
  }
}

// =============================================================================
// Logging Helpers
// =============================================================================

/**
 * Log a database operation
 */
export function logDbOperation(
  log: Logger,
  operation: string,
  details: {
    table?: string;
    rows?: number;
    duration_ms: number;
    error?: string;
  }
): void {
  if (details.error) {
    log.error(
      {
        event: 'db_operation',
        operation,
        ...details,
      },
      `Database ${operation} failed: ${details.error}`
    );
  } else {
    log.debug(
      {
        event: 'db_operation',
        operation,
        ...details,
      },
      `Database ${operation} completed`
    );
  }
}

/**
 * Log an external service call
 */
export function logExternalCall(
  log: Logger,
  service: 'openai' | 'azure' | 'cohere' | 'other',
  operation: string,
  details: {
    duration_ms?: number;
    status?: number | string;
    error?: string;
    tokens?: number;
    model?: string;
    attempt?: number;
  }
): void {
  const baseLog = {
    event: 'external_call',
    service,
    operation,
    ...details,
    ...(details.error && { error: sanitizeString(details.error) }),
  };

  if (details.error) {
    log.error(baseLog, `${service} ${operation} failed: ${baseLog.error}`);
  } else {
    log.debug(baseLog, `${service} ${operation} completed`);
  }
}

/**
 * Log a security event
 */
export function logSecurityEvent(
  log: Logger,
  event: 'blocked_term' | 'prompt_injection' | 'rate_limit',
  details: {
    input?: string;
    reason?: string;
    clientId?: string;
  }
): void {
  log.warn(
    {
      event: `security_${event}`,
      ...details,
      input: details.input ? truncateText(details.input, 100) : undefined,
    },
    `Security event: ${event}`
  );
}

/**
 * Log RAG pipeline step
 */
export function logRagStep(
  log: Logger,
  step: 'embedding' | 'retrieval' | 'reranking' | 'generation' | 'citation',
  details: {
    duration_ms?: number;
    chunks?: number;
    tokens?: number;
    model?: string;
    error?: string;
  }
): void {
  const baseLog = {
    event: `rag_${step}`,
    ...details,
  };

  if (details.error) {
    log.error(baseLog, `RAG ${step} failed: ${details.error}`);
  } else {
    log.debug(baseLog, `RAG ${step} completed`);
  }
}

/**
 * Log an ingestion step
 */
export function logIngestStep(
  log: Logger,
  step: 'discover' | 'extract' | 'chunk' | 'embed' | 'upsert',
  details: {
    file?: string;
    files?: number;
    units?: number;
    chunks?: number;
    duration_ms?: number;
    error?: string;
  }
): void {
  const baseLog = {
    event: `ingest_${step}`,
    ...details,
  };

  if (details.error) {
    log.error(baseLog, `Ingest ${step} failed: ${details.error}`);
  } else {
    log.info(baseLog, `Ingest ${step} completed`);
  }
}

// =============================================================================
// Export Types
// =============================================================================

export type { Logger } from 'pino';
