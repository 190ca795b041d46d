/**
 * Answer every ground-truth question and write the rows to
 * DATA_DIR/evaluation_results_basic.json.
 */

import 'dotenv/config';
import { writeFile } from 'fs/promises';
import path from 'path';
import { loadSettings } from '@/lib/config';
import { createRAGPipeline } from '@/lib/rag';
import { loadGroundTruth, runEvaluation, summarizeEvaluation } from '@/lib/eval';
import { closeDb } from '@/db';

const RESULTS_FILE = 'evaluation_results_basic.json';

async function main() {
  const settings = loadSettings();
  const pairs = await loadGroundTruth(settings.paths.groundtruthDir);

  if (pairs.length === 0) {
    console.error(`No ground-truth questions found in ${settings.paths.groundtruthDir}`);
    process.exitCode = 1;
    return;
  }

  const pipeline = createRAGPipeline(settings);
  try {
    const rows = await runEvaluation(pipeline, pairs);
    const summary = summarizeEvaluation(rows);

    const outputPath = path.join(settings.paths.dataDir, RESULTS_FILE);
    await writeFile(outputPath, JSON.stringify(rows, null, 2), 'utf-8');

    console.log(`Questions:        ${summary.total}`);
    for (const [status, count] of Object.entries(summary.byStatus)) {
      console.log(`  ${status.padEnd(14)}${count}`);
    }
    console.log(`Average contexts: ${summary.averageContexts.toFixed(2)}`);
    console.log(`\nResults written to ${outputPath}`);
  } finally {
    await closeDb();
  }
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
