/**
 * LLM Adapter Factory.
 *
 * Creates LLM adapters based on provider configuration.
 * Enables switching between providers without code changes.
 */

import { LLMAdapter, LLMAdapterConfig, LLMProvider } from './adapter';
import { OpenAIAdapter } from './openai-adapter';
import { DummyAdapter } from './dummy-adapter';
import { loggers } from '@/lib/logger';
import type { Settings } from '@/lib/config';

const log = loggers.external.child({ service: 'LLMFactory' });

// =============================================================================
// Adapter Registry
// =============================================================================

type AdapterConstructor = new (config: LLMAdapterConfig) => LLMAdapter;

const adapterRegistry = new Map<LLMProvider, AdapterConstructor>([
  ['openai', OpenAIAdapter],
  ['azure', OpenAIAdapter],
  ['dummy', DummyAdapter],
]);

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create an LLM adapter for a specific provider.
 *
 * @throws Error if provider is not supported
 *
 * @example
 * const adapter = createLLMAdapter('openai', {
 *   apiKey: 'test-key',
 *   defaultModel: 'gpt-4o-mini',
 * });
 */
export function createLLMAdapter(
  provider: LLMProvider,
  config: LLMAdapterConfig
): LLMAdapter {
  const AdapterClass = adapterRegistry.get(provider);

  if (!AdapterClass) {
    throw new Error(
      `Unsupported LLM provider: ${provider}. ` +
      `Supported providers: ${Array.from(adapterRegistry.keys()).join(', ')}`
    );
  }

  return new AdapterClass(config);
}

/**
 * Create the adapter selected in settings.
 * A provider whose credentials are missing degrades to the dummy adapter.
 */
export function createLLMAdapterFromSettings(settings: Settings): LLMAdapter {
  const { provider, model, timeoutMs, openaiApiKey, azure } = settings.llm;

  switch (provider) {
    case 'openai':
      if (openaiApiKey) {
        return createLLMAdapter('openai', { apiKey: openaiApiKey, defaultModel: model, timeoutMs });
      }
      log.warn({ event: 'llm_fallback', provider }, 'OPENAI_API_KEY not set, using dummy LLM');
      break;

    case 'azure':
      if (azure.apiKey && azure.endpoint) {
        return createLLMAdapter('azure', {
          apiKey: azure.apiKey,
          timeoutMs,
          azure: {
            endpoint: azure.endpoint,
            deployment: azure.deployment,
            apiVersion: azure.apiVersion,
          },
        });
      }
      log.warn(
        { event: 'llm_fallback', provider },
        'AZURE_OPENAI_ENDPOINT or AZURE_OPENAI_API_KEY not set, using dummy LLM'
      );
      break;

    case 'dummy':
      break;
  }

  return createLLMAdapter('dummy', { apiKey: '' });
}
