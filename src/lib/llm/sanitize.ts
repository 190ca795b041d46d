/**
 * Query Guardrail
 *
 * Rejects queries that contain a blocked term or a known prompt-injection
 * phrase before they reach embedding, search or generation.
 *
 * This is a best-effort heuristic filter, not a security boundary:
 * paraphrases and encodings of the same attack pass through, and the
 * system prompt remains the main defence.
 */

import { loggers, logSecurityEvent } from '@/lib/logger';
import { getBlockedTermsList, type Settings } from '@/lib/config';

const log = loggers.security.child({ service: 'QueryGuardrail' });

// =============================================================================
// Configuration
// =============================================================================

/**
 * Prompt-injection phrases, matched against the lower-cased query.
 */
export const INJECTION_PATTERNS: readonly RegExp[] = [
  // Direct instruction overrides
  /ignore\s+(previous|above|all)\s+instructions/,

  // Role manipulation
  /you\s+are\s+(now|a)\s+\w+/,

  // Fake role markers
  /system\s*:\s*/,

  // Chat-template sentinel tokens
  /<\|im_start\|>/,
  /<\|endoftext\|>/,
];

// =============================================================================
// Types
// =============================================================================

export type BlockReason = 'blocked_term' | 'prompt_injection';

export interface SanitizeResult {
  /** Query cut to the maximum length, original casing */
  query: string;
  isSafe: boolean;
  truncated: boolean;
  reason: BlockReason | null;
  /** Blocked term or pattern source that triggered the rejection */
  match: string | null;
}

export interface GuardrailOptions {
  maxQueryLength: number;
  /** Lower-case terms, matched as substrings */
  blockedTerms: string[];
}

// =============================================================================
// Detection
// =============================================================================

/**
 * First blocked term contained in the text, or null.
 */
export function findBlockedTerm(text: string, blockedTerms: string[]): string | null {
  const lower = text.toLowerCase();
  return blockedTerms.find((term) => term && lower.includes(term)) ?? null;
}

/**
 * Sources of every injection pattern found in the text.
 */
export function detectInjectionPatterns(text: string): string[] {
  const lower = text.toLowerCase();
  return INJECTION_PATTERNS.filter((pattern) => pattern.test(lower)).map((pattern) => pattern.source);
}

// =============================================================================
// Sanitization
// =============================================================================

/**
 * Truncate the query, then check blocked terms, then injection patterns.
 */
export function sanitizeQuery(
  query: string,
  options: GuardrailOptions,
  clientId?: string
): SanitizeResult {
  const truncated = query.length > options.maxQueryLength;
  const text = truncated ? query.slice(0, options.maxQueryLength) : query;

  const term = findBlockedTerm(text, options.blockedTerms);
  if (term) {
    logSecurityEvent(log, 'blocked_term', { input: text, reason: term, clientId });
    return { query: text, isSafe: false, truncated, reason: 'blocked_term', match: term };
  }

  const [pattern] = detectInjectionPatterns(text);
  if (pattern) {
    logSecurityEvent(log, 'prompt_injection', { input: text, reason: pattern, clientId });
    return { query: text, isSafe: false, truncated, reason: 'prompt_injection', match: pattern };
  }

  return { query: text, isSafe: true, truncated, reason: null, match: null };
}

/**
 * Guardrail bound to one configuration.
 */
export class QueryGuardrail {
  constructor(private readonly options: GuardrailOptions) {}

  static fromSettings(settings: Settings): QueryGuardrail {
    return new QueryGuardrail({
      maxQueryLength: settings.guardrails.maxQueryLength,
      blockedTerms: getBlockedTermsList(settings.guardrails.blockedTerms),
    });
  }

  sanitize(query: string, clientId?: string): SanitizeResult {
    return sanitizeQuery(query, this.options, clientId);
  }
}
