/**
 * Ask one question from the command line.
 *
 * Usage: npm run ask -- "<question>" [--top-k N] [--product NAME]
 */

import 'dotenv/config';
import { parseArgs } from 'util';
import { loadSettings } from '@/lib/config';
import { createRAGPipeline, parseAnswerRequest, formatSourcesSection } from '@/lib/rag';
import { closeDb } from '@/db';

function parseCli() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      'top-k': { type: 'string' },
      product: { type: 'string' },
    },
  });

  return {
    query: positionals.join(' '),
    topK: values['top-k'] === undefined ? undefined : Number(values['top-k']),
    filters: values.product ? { product: values.product } : undefined,
  };
}

async function main() {
  const settings = loadSettings();
  const request = parseAnswerRequest(parseCli(), settings.guardrails.maxQueryLength);
  const pipeline = createRAGPipeline(settings);

  try {
    const result = await pipeline.answer(request.query, {
      topK: request.topK,
      filters: request.filters,
      clientId: 'cli',
    });

    console.log(result.answer);
    if (result.citations.length > 0) {
      console.log(`\n${formatSourcesSection(result.citations)}`);
    }
    console.log(`\nStatus: ${result.status}`);
    if (result.status === 'success') {
      const { usage } = result;
      console.log(
        `Model: ${usage.model} | tokens ${usage.tokensPrompt}+${usage.tokensCompletion} | ` +
          `${usage.totalLatencyMs}ms (retrieval ${usage.retrievalTimeMs}ms, ` +
          `rerank ${usage.rerankTimeMs}ms, llm ${usage.llmTimeMs}ms)`
      );
    }
  } finally {
    await closeDb();
  }
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
