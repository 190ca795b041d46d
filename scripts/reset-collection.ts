/**
 * Drop every indexed chunk and re-create the empty collection.
 *
 * Usage: npm run reset-collection -- --yes
 */

import 'dotenv/config';
import { loadSettings } from '@/lib/config';
import { createRAGPipeline } from '@/lib/rag';
import { closeDb } from '@/db';

async function main() {
  const settings = loadSettings();

  if (!process.argv.includes('--yes')) {
    console.error(`This deletes every chunk in "${settings.vectorStore.collection}". Re-run with --yes.`);
    process.exitCode = 1;
    return;
  }

  const pipeline = createRAGPipeline(settings);
  try {
    const before = await pipeline.collectionDocumentCount();
    await pipeline.resetCollection();
    console.log(`Dropped ${before} chunks from ${settings.vectorStore.collection}`);
  } finally {
    await closeDb();
  }
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
