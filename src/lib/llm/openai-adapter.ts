/**
 * OpenAI adapter implementation.
 *
 * Supports:
 * - api.openai.com chat completions (gpt-4o-mini by default)
 * - Azure OpenAI deployments through the same SDK
 * - Per-request timeout; retries are left to the caller
 */

import OpenAI, { AzureOpenAI } from 'openai';
import {
  BaseLLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  LLMProvider,
  FinishReason,
} from './adapter';

export class OpenAIAdapter extends BaseLLMAdapter {
  readonly provider: LLMProvider;
  private client: OpenAI;

  constructor(config: LLMAdapterConfig) {
    super({
      ...config,
      // Azure routes by deployment name, not model name
      defaultModel: config.azure?.deployment ?? config.defaultModel ?? 'gpt-4o-mini',
    });

    if (config.azure) {
      this.provider = 'azure';
      this.client = new AzureOpenAI({
        apiKey: this.apiKey,
        endpoint: config.azure.endpoint,
        deployment: config.azure.deployment,
        apiVersion: config.azure.apiVersion,
        timeout: this.timeoutMs,
        maxRetries: 0,
      });
    } else {
      this.provider = 'openai';
      this.client = new OpenAI({
        apiKey: this.apiKey,
        timeout: this.timeoutMs,
        maxRetries: 0,
      });
    }
  }

  /**
   * Generate a text completion using the Chat Completions API.
   */
  async complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMCompletionResponse> {
    const response = await this.client.chat.completions.create({
      model: options?.model ?? this.defaultModel,
      messages: messages.map(m => ({
        role: m.role,
        content: m.content,
      })),
      temperature: options?.temperature ?? 0.1,
      max_tokens: options?.maxTokens ?? 1500,
    });

    const choice = response.choices[0];

    return {
      content: choice?.message.content ?? '',
      model: response.model,
      finishReason: this.mapFinishReason(choice?.finish_reason),
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
    };
  }

  /**
   * Map OpenAI finish reason to our standard type.
   */
  private mapFinishReason(
    reason: string | null | undefined
  ): FinishReason {
    switch (reason) {
      case 'stop':
        return 'stop';
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return null;
    }
  }
}
