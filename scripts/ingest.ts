/**
 * Ingest every PDF, DOCX and TXT file in a directory.
 *
 * Usage: npm run ingest -- [directory]
 * Defaults to DOCS_DIR.
 */

import 'dotenv/config';
import { loadSettings } from '@/lib/config';
import { createRAGPipeline } from '@/lib/rag';
import { closeDb } from '@/db';

async function main() {
  const settings = loadSettings();
  const pipeline = createRAGPipeline(settings);
  const directory = process.argv[2] ?? settings.paths.docsDir;

  console.log(`Ingesting documents from ${directory}...\n`);

  try {
    const result = await pipeline.ingest(directory);
    if (result.status === 'error') {
      console.error(`Ingestion failed: ${result.error} (files: ${result.filesProcessed})`);
      process.exitCode = 1;
      return;
    }

    console.log(`Files processed:    ${result.filesProcessed}`);
    console.log(`Chunks created:     ${result.chunksCreated}`);
    console.log(`Documents upserted: ${result.documentsUpserted}`);
    console.log(`Elapsed:            ${result.elapsedSeconds}s`);
  } finally {
    await closeDb();
  }
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
