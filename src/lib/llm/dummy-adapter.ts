/**
 * Offline adapter that answers every prompt with a fixed text.
 * Token counts are estimated from character length.
 */

import { estimateTokens } from '@/lib/rag/chunker';
import { DUMMY_ANSWER } from '@/lib/rag/config';
import {
  BaseLLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
} from './adapter';

export const DUMMY_MODEL = 'dummy';

export class DummyAdapter extends BaseLLMAdapter {
  readonly provider = 'dummy';

  constructor(config: Partial<LLMAdapterConfig> = {}) {
    super({ apiKey: '', ...config, defaultModel: DUMMY_MODEL });
  }

  async complete(
    messages: LLMMessage[],
    _options?: LLMCompletionOptions
  ): Promise<LLMCompletionResponse> {
    const promptTokens = messages.reduce((sum, m) => sum + estimateTokens(m.content), 0);
    const completionTokens = estimateTokens(DUMMY_ANSWER);

    return {
      content: DUMMY_ANSWER,
      model: DUMMY_MODEL,
      finishReason: 'stop',
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: promptTokens + completionTokens,
      },
    };
  }
}
