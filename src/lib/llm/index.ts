/**
 * LLM module exports.
 */

export { BaseLLMAdapter } from './adapter';
export type {
  LLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  LLMProvider,
  FinishReason,
  TokenUsage,
} from './adapter';

export { OpenAIAdapter } from './openai-adapter';
export { DummyAdapter, DUMMY_MODEL } from './dummy-adapter';

export {
  createLLMAdapter,
  createLLMAdapterFromSettings,
} from './factory';

export {
  LLMGenerationProvider,
  createGenerationProvider,
  type GenerateOptions,
  type GenerationProvider,
  type GenerationResult,
  type LLMGenerationConfig,
} from './generation';

export {
  buildRAGSystemPrompt,
  buildRAGUserPrompt,
  buildContext,
  formatSourceHeader,
  type PromptPassage,
} from './prompts';

// Query guardrail
export {
  QueryGuardrail,
  sanitizeQuery,
  findBlockedTerm,
  detectInjectionPatterns,
  INJECTION_PATTERNS,
  type BlockReason,
  type GuardrailOptions,
  type SanitizeResult,
} from './sanitize';
