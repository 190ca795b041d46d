/**
 * LLM adapter interface types.
 *
 * These types define the contract for LLM provider adapters,
 * enabling switching between OpenAI, Azure OpenAI and the offline stub.
 */

/**
 * Supported LLM providers.
 */
export type LLMProvider = 'openai' | 'azure' | 'dummy';

/**
 * Message in a chat conversation.
 */
export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Options for text completion.
 */
export interface LLMCompletionOptions {
  model?: string;           // Override default model
  temperature?: number;     // 0.0 - 2.0 (lower = more deterministic)
  maxTokens?: number;       // Max response tokens
}

/**
 * Response from text completion.
 */
export interface LLMCompletionResponse {
  content: string;
  /** Model that produced the answer, as reported by the provider */
  model: string;
  finishReason: FinishReason;
  usage: TokenUsage;
}

/**
 * Reason for completion stopping.
 */
export type FinishReason = 'stop' | 'length' | 'content_filter' | null;

/**
 * Token usage statistics.
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Core LLM adapter interface.
 *
 * All provider adapters must implement this interface.
 */
export interface LLMAdapter {
  /** Provider name (e.g., 'openai', 'azure') */
  readonly provider: LLMProvider;

  /** Model used when a request names none (the deployment on Azure) */
  getDefaultModel(): string;

  /**
   * Generate a text completion.
   *
   * @param messages - Conversation messages
   * @param options - Generation options
   * @returns Completion response with content and usage
   */
  complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMCompletionResponse>;
}

/**
 * Azure OpenAI deployment settings.
 */
export interface AzureDeploymentConfig {
  endpoint: string;
  deployment: string;
  apiVersion: string;
}

/**
 * Configuration for creating an LLM adapter.
 */
export interface LLMAdapterConfig {
  apiKey: string;
  defaultModel?: string;
  timeoutMs?: number;
  /** Use the Azure OpenAI client instead of api.openai.com */
  azure?: AzureDeploymentConfig;
}
