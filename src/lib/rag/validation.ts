/**
 * Request validation for answer() callers.
 */

import { z } from 'zod';

export const MAX_TOP_K = 20;

/**
 * Build the answer request schema for a maximum query length.
 */
export function createAnswerRequestSchema(maxQueryLength: number) {
  return z.object({
    query: z
      .string()
      .trim()
      .min(1, 'Query is required')
      .max(maxQueryLength, `Query must be at most ${maxQueryLength} characters`),
    topK: z.number().int().min(1).max(MAX_TOP_K).optional(),
    filters: z.record(z.string(), z.string()).optional(),
  });
}

export const answerRequestSchema = createAnswerRequestSchema(500);

export type AnswerRequest = z.infer<typeof answerRequestSchema>;

/**
 * Validate an untrusted answer request.
 *
 * @throws ZodError listing every invalid field
 */
export function parseAnswerRequest(input: unknown, maxQueryLength = 500): AnswerRequest {
  return createAnswerRequestSchema(maxQueryLength).parse(input);
}
