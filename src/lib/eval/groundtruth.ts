/**
 * Ground-truth question sets for offline evaluation.
 *
 * Each *.jsonl file holds one {question, answer, metadata?} object per
 * line. metadata is passed to answer() as search filters.
 */

import { readdir, readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { loggers } from '@/lib/logger';
import { toErrorMessage } from '@/lib/errors';

const log = loggers.eval.child({ service: 'GroundTruth' });

export const qaPairSchema = z.object({
  question: z.string().min(1),
  answer: z.string(),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

export type QAPair = z.infer<typeof qaPairSchema>;

/**
 * Parse JSONL content; blank lines are ignored, malformed lines logged
 * and skipped.
 */
export function parseGroundTruth(content: string, source = '<inline>'): QAPair[] {
  const pairs: QAPair[] = [];

  content.split('\n').forEach((line, index) => {
    if (!line.trim()) return;

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      log.error(
        { event: 'groundtruth_parse_error', file: source, line: index + 1, error: toErrorMessage(error) },
        'Failed to parse ground-truth line'
      );
      return;
    }

    const parsed = qaPairSchema.safeParse(value);
    if (!parsed.success) {
      log.error(
        { event: 'groundtruth_invalid', file: source, line: index + 1, issues: parsed.error.issues.length },
        'Ground-truth line is missing question or answer'
      );
      return;
    }
    pairs.push(parsed.data);
  });

  return pairs;
}

/**
 * Load every *.jsonl file in a directory, in file name order.
 * A missing directory yields no pairs.
 */
export async function loadGroundTruth(directory: string): Promise<QAPair[]> {
  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (error) {
    log.error(
      { event: 'groundtruth_dir_missing', directory, error: toErrorMessage(error) },
      `Ground-truth directory not found: ${directory}`
    );
    return [];
  }

  const files = entries.filter((name) => name.toLowerCase().endsWith('.jsonl')).sort();
  const pairs: QAPair[] = [];

  for (const name of files) {
    const filePath = path.join(directory, name);
    const loaded = parseGroundTruth(await readFile(filePath, 'utf-8'), filePath);
    log.info({ event: 'groundtruth_loaded', file: filePath, pairs: loaded.length }, 'Loaded ground truth');
    pairs.push(...loaded);
  }

  log.info({ event: 'groundtruth_total', pairs: pairs.length }, `Loaded ${pairs.length} QA pairs`);
  return pairs;
}
