/**
 * Base LLM adapter class.
 *
 * Provides the interface that all LLM provider adapters must implement.
 */

import {
  LLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  LLMProvider,
  FinishReason,
  TokenUsage,
} from '@/types/llm';

/**
 * Abstract base class for LLM adapters.
 *
 * Subclasses must implement complete().
 */
export abstract class BaseLLMAdapter implements LLMAdapter {
  abstract readonly provider: LLMProvider;

  protected apiKey: string;
  protected defaultModel: string;
  protected timeoutMs?: number;

  constructor(config: LLMAdapterConfig) {
    this.apiKey = config.apiKey;
    this.defaultModel = config.defaultModel ?? 'gpt-4o-mini';
    this.timeoutMs = config.timeoutMs;
  }

  /**
   * Generate a text completion.
   */
  abstract complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMCompletionResponse>;

  getDefaultModel(): string {
    return this.defaultModel;
  }
}

// Re-export types for convenience
export type {
  LLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  LLMProvider,
  FinishReason,
  TokenUsage,
};
