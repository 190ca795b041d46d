/**
 * Generation Capability
 *
 * Wraps an LLMAdapter as a single-prompt generator with bounded retries
 * and exponential backoff. Generation never writes to the index, so a
 * retried call has no side effects to duplicate.
 */

import { GenerationError, toErrorMessage } from '@/lib/errors';
import { loggers, logExternalCall } from '@/lib/logger';
import { withRetry, RetryExhaustedError, type RetryOptions } from '@/lib/retry';
import {
  GENERATION_RETRY_BASE_DELAY_MS,
  GENERATION_RETRY_MAX_DELAY_MS,
} from '@/lib/rag/config';
import type { Settings } from '@/lib/config';
import type { LLMAdapter, LLMMessage } from './adapter';
import { createLLMAdapterFromSettings } from './factory';

const log = loggers.external.child({ service: 'Generation' });

// =============================================================================
// Types
// =============================================================================

export interface GenerateOptions {
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface GenerationResult {
  answer: string;
  model: string;
  promptTokens: number;
  completionTokens: number;
  latencyMs: number;
}

export interface GenerationProvider {
  readonly model: string;
  generate(prompt: string, options?: GenerateOptions): Promise<GenerationResult>;
}

export interface LLMGenerationConfig {
  temperature: number;
  maxTokens: number;
  maxAttempts: number;
}

// =============================================================================
// Provider
// =============================================================================

export class LLMGenerationProvider implements GenerationProvider {
  constructor(
    private readonly adapter: LLMAdapter,
    private readonly config: LLMGenerationConfig,
    private readonly retry: Partial<Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'sleep'>> = {}
  ) {}

  get model(): string {
    return this.adapter.getDefaultModel();
  }

  private get service(): 'openai' | 'azure' | 'other' {
    const { provider } = this.adapter;
    return provider === 'dummy' ? 'other' : provider;
  }

  /**
   * Generate an answer for one prompt.
   *
   * @throws GenerationError once every attempt has failed
   */
  async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerationResult> {
    const messages: LLMMessage[] = [];
    if (options.systemPrompt) {
      messages.push({ role: 'system', content: options.systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    const start = Date.now();

    try {
      const response = await withRetry(
        () =>
          this.adapter.complete(messages, {
            temperature: options.temperature ?? this.config.temperature,
            maxTokens: options.maxTokens ?? this.config.maxTokens,
          }),
        {
          maxAttempts: this.config.maxAttempts,
          baseDelayMs: this.retry.baseDelayMs ?? GENERATION_RETRY_BASE_DELAY_MS,
          maxDelayMs: this.retry.maxDelayMs ?? GENERATION_RETRY_MAX_DELAY_MS,
          sleep: this.retry.sleep,
          onRetry: (error, attempt, delayMs) => {
            log.warn(
              {
                event: 'generation_retry',
                provider: this.adapter.provider,
                attempt,
                delay_ms: delayMs,
                error: toErrorMessage(error),
              },
              `Generation attempt ${attempt} failed, retrying in ${delayMs}ms`
            );
          },
        }
      );

      const latencyMs = Date.now() - start;
      logExternalCall(log, this.service, 'chat.completions', {
        duration_ms: latencyMs,
        tokens: response.usage.totalTokens,
        model: response.model,
      });

      return {
        answer: response.content,
        model: response.model,
        promptTokens: response.usage.promptTokens,
        completionTokens: response.usage.completionTokens,
        latencyMs,
      };
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        logExternalCall(log, this.service, 'chat.completions', {
          duration_ms: Date.now() - start,
          attempt: error.attempts,
          error: toErrorMessage(error.lastError),
        });
        throw new GenerationError(error.attempts, error.lastError);
      }
      throw error;
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createGenerationProvider(settings: Settings): GenerationProvider {
  const adapter = createLLMAdapterFromSettings(settings);
  const { temperature, maxTokens, maxAttempts } = settings.llm;

  return new LLMGenerationProvider(adapter, {
    temperature,
    maxTokens,
    maxAttempts,
  });
}
