/**
 * Tests for embedding providers
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

// Store mock references for tests
const mockEmbeddingsCreate = vi.fn();
const mockConstructorCalls: Array<{ apiKey: string }> = [];
const mockAzureConstructorCalls: Array<Record<string, unknown>> = [];

// Mock OpenAI before importing - use actual class definition
vi.mock('openai', () => {
  return {
    default: class MockOpenAI {
      embeddings = { create: mockEmbeddingsCreate };
      constructor(config: { apiKey: string }) {
        mockConstructorCalls.push(config);
      }
    },
    AzureOpenAI: class MockAzureOpenAI {
      embeddings = { create: mockEmbeddingsCreate };
      constructor(config: Record<string, unknown>) {
        mockAzureConstructorCalls.push(config);
      }
    },
  };
});

import {
  OpenAIEmbeddingProvider,
  HashingEmbeddingProvider,
  createEmbeddingProvider,
  DEFAULT_EMBEDDING_MODEL,
} from '../embeddings';
import { loadSettings } from '@/lib/config';

// =============================================================================
// Test Setup
// =============================================================================

const embeddingResponse = (vectors: number[][], order?: number[]) => ({
  data: (order ?? vectors.map((_, i) => i)).map((index) => ({
    index,
    embedding: vectors[index],
  })),
  usage: { prompt_tokens: 10, total_tokens: 10 },
});

const norm = (v: number[]) => Math.sqrt(v.reduce((sum, x) => sum + x * x, 0));

// =============================================================================
// OpenAIEmbeddingProvider Tests
// =============================================================================

describe('OpenAIEmbeddingProvider', () => {
  beforeEach(() => {
    mockEmbeddingsCreate.mockReset();
    mockConstructorCalls.length = 0;
    mockAzureConstructorCalls.length = 0;
  });

  describe('constructor', () => {
    it('should create provider with default model', () => {
      const provider = new OpenAIEmbeddingProvider('test-api-key');

      expect(mockConstructorCalls).toContainEqual({ apiKey: 'test-api-key' });
      expect(provider.dimension()).toBe(3072);
    });

    it('should create an Azure client when Azure settings are given', async () => {
      mockEmbeddingsCreate.mockResolvedValue(embeddingResponse([[0.5, 0.5]]));

      const provider = new OpenAIEmbeddingProvider('test-key', {
        model: 'seguros-embeddings',
        azure: { endpoint: 'https://example.openai.azure.com', apiVersion: '2024-02-01' },
      });
      await provider.embedOne('franquia');

      expect(mockConstructorCalls).toHaveLength(0);
      expect(mockAzureConstructorCalls).toEqual([
        { apiKey: 'test-key', endpoint: 'https://example.openai.azure.com', apiVersion: '2024-02-01' },
      ]);
      expect(mockEmbeddingsCreate).toHaveBeenCalledWith({ model: 'seguros-embeddings', input: ['franquia'] });
    });

    it('should report the dimension of the configured model', () => {
      expect(new OpenAIEmbeddingProvider('test-key', { model: 'text-embedding-3-small' }).dimension()).toBe(1536);
      expect(new OpenAIEmbeddingProvider('test-key', { model: 'text-embedding-ada-002' }).dimension()).toBe(1536);
    });
  });

  describe('embedBatch', () => {
    it('should return empty array for empty input without calling the API', async () => {
      const provider = new OpenAIEmbeddingProvider('test-key');

      await expect(provider.embedBatch([])).resolves.toEqual([]);
      expect(mockEmbeddingsCreate).not.toHaveBeenCalled();
    });

    it('should keep input order when the API returns data out of order', async () => {
      mockEmbeddingsCreate.mockResolvedValueOnce(
        embeddingResponse([[0.1], [0.2], [0.3]], [2, 0, 1])
      );
      const provider = new OpenAIEmbeddingProvider('test-key');

      const vectors = await provider.embedBatch(['a', 'b', 'c']);

      expect(vectors).toEqual([[0.1], [0.2], [0.3]]);
      expect(mockEmbeddingsCreate).toHaveBeenCalledWith({
        model: DEFAULT_EMBEDDING_MODEL,
        input: ['a', 'b', 'c'],
      });
    });

    it('should send at most 100 texts per request', async () => {
      mockEmbeddingsCreate.mockImplementation(async ({ input }: { input: string[] }) =>
        embeddingResponse(input.map((text) => [Number(text)]))
      );
      const provider = new OpenAIEmbeddingProvider('test-key');
      const texts = Array.from({ length: 250 }, (_, i) => String(i));

      const vectors = await provider.embedBatch(texts);

      expect(mockEmbeddingsCreate).toHaveBeenCalledTimes(3);
      expect(mockEmbeddingsCreate.mock.calls.map(([req]) => req.input.length)).toEqual([100, 100, 50]);
      expect(vectors).toHaveLength(250);
      expect(vectors[0]).toEqual([0]);
      expect(vectors[249]).toEqual([249]);
    });

    it('should propagate API errors', async () => {
      mockEmbeddingsCreate.mockRejectedValueOnce(new Error('API rate limit exceeded'));
      const provider = new OpenAIEmbeddingProvider('test-key');

      await expect(provider.embedBatch(['text'])).rejects.toThrow('API rate limit exceeded');
    });
  });

  describe('embedOne', () => {
    it('should return the single vector', async () => {
      mockEmbeddingsCreate.mockResolvedValueOnce(embeddingResponse([[0.5, 0.5]]));
      const provider = new OpenAIEmbeddingProvider('test-key');

      await expect(provider.embedOne('pergunta')).resolves.toEqual([0.5, 0.5]);
    });
  });
});

// =============================================================================
// HashingEmbeddingProvider Tests
// =============================================================================

describe('HashingEmbeddingProvider', () => {
  it('should produce vectors of the configured dimension', async () => {
    const provider = new HashingEmbeddingProvider(64);

    const [vector] = await provider.embedBatch(['Danos próprios']);

    expect(provider.dimension()).toBe(64);
    expect(vector).toHaveLength(64);
  });

  it('should L2-normalise non-empty texts', async () => {
    const provider = new HashingEmbeddingProvider(64);

    const vector = await provider.embedOne('Seguro automóvel com assistência em viagem');

    expect(norm(vector)).toBeCloseTo(1, 10);
  });

  it('should return the zero vector for text without words', async () => {
    const provider = new HashingEmbeddingProvider(8);

    await expect(provider.embedOne('... !!')).resolves.toEqual(new Array(8).fill(0));
  });

  it('should be deterministic and case-insensitive', async () => {
    const provider = new HashingEmbeddingProvider(32);

    const [a, b] = await provider.embedBatch(['Franquia Fixa', 'franquia fixa']);

    expect(a).toEqual(b);
  });

  it('should preserve order and length', async () => {
    const provider = new HashingEmbeddingProvider(16);
    const texts = ['um', 'dois', 'três'];

    const batch = await provider.embedBatch(texts);

    expect(batch).toHaveLength(3);
    expect(batch[1]).toEqual(await provider.embedOne('dois'));
  });

  it('should reject a non-positive dimension', () => {
    expect(() => new HashingEmbeddingProvider(0)).toThrow('positive integer');
  });
});

// =============================================================================
// Factory Tests
// =============================================================================

describe('createEmbeddingProvider', () => {
  beforeEach(() => {
    mockConstructorCalls.length = 0;
    mockAzureConstructorCalls.length = 0;
  });

  it('should use OpenAI when a key is configured', () => {
    const settings = loadSettings({ VECTOR_STORE: 'memory', OPENAI_API_KEY: 'test-key' });

    expect(createEmbeddingProvider(settings).name).toBe('openai');
  });

  it('should use the Azure credentials when the LLM provider is azure', () => {
    const settings = loadSettings({
      VECTOR_STORE: 'memory',
      LLM_PROVIDER: 'azure',
      AZURE_OPENAI_ENDPOINT: 'https://example.openai.azure.com',
      AZURE_OPENAI_API_KEY: 'test-key',
    });

    const provider = createEmbeddingProvider(settings);

    expect(provider.name).toBe('openai');
    expect(provider.dimension()).toBe(3072);
    expect(mockConstructorCalls).toHaveLength(0);
    expect(mockAzureConstructorCalls[0]).toEqual({
      apiKey: 'test-key',
      endpoint: 'https://example.openai.azure.com',
      apiVersion: '2024-02-01',
    });
  });

  it('should fall back to hashing when Azure is incomplete', () => {
    const settings = loadSettings({
      VECTOR_STORE: 'memory',
      LLM_PROVIDER: 'azure',
      AZURE_OPENAI_API_KEY: 'test-key',
    });

    expect(createEmbeddingProvider(settings).name).toBe('hashing');
  });

  it('should fall back to hashing without an OpenAI key', () => {
    const settings = loadSettings({ VECTOR_STORE: 'memory', VECTOR_SIZE: '128' });
    const provider = createEmbeddingProvider(settings);

    expect(provider.name).toBe('hashing');
    expect(provider.dimension()).toBe(128);
  });

  it('should use hashing when selected', () => {
    const settings = loadSettings({
      VECTOR_STORE: 'memory',
      EMBEDDINGS_PROVIDER: 'hashing',
      OPENAI_API_KEY: 'test-key',
    });

    expect(createEmbeddingProvider(settings).name).toBe('hashing');
  });
});
