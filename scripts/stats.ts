/**
 * Print collection and provider details.
 */

import 'dotenv/config';
import { loadSettings } from '@/lib/config';
import { createRAGPipeline } from '@/lib/rag';
import { closeDb } from '@/db';

async function main() {
  const pipeline = createRAGPipeline(loadSettings());

  try {
    const stats = await pipeline.stats();
    console.log(`Collection:      ${stats.collection}`);
    console.log(`Indexed chunks:  ${stats.totalDocuments}`);
    console.log(`Embeddings:      ${stats.embeddingsProvider}`);
    console.log(`Reranker:        ${stats.reranker}`);
    console.log(`LLM model:       ${stats.llmModel}`);
  } finally {
    await closeDb();
  }
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
