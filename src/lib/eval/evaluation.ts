/**
 * Evaluation runner: answers every ground-truth question and collects
 * rows suitable for an external scoring tool.
 */

import { loggers, truncateText } from '@/lib/logger';
import { toErrorMessage } from '@/lib/errors';
import type { AnswerResult, RAGPipeline } from '@/lib/rag/service';
import type { QAPair } from './groundtruth';

const log = loggers.eval.child({ service: 'Evaluation' });

export const FAILED_ANSWER = 'ERROR: Failed to generate answer';

export type EvaluationStatus = AnswerResult['status'] | 'error';

export interface EvaluationRow {
  question: string;
  groundTruth: string;
  answer: string;
  /** Citation excerpts the answer was grounded on */
  contexts: string[];
  status: EvaluationStatus;
}

export interface EvaluationSummary {
  total: number;
  byStatus: Record<EvaluationStatus, number>;
  averageContexts: number;
}

/**
 * Answer each question in order. A failing question still produces a row
 * so results stay aligned with the input.
 */
export async function runEvaluation(
  pipeline: Pick<RAGPipeline, 'answer'>,
  pairs: QAPair[]
): Promise<EvaluationRow[]> {
  const rows: EvaluationRow[] = [];

  for (const pair of pairs) {
    log.info({ event: 'eval_question', question: truncateText(pair.question, 80) }, 'Processing question');

    try {
      const result = await pipeline.answer(pair.question, { filters: pair.metadata });
      const contexts = result.citations.map((c) => c.excerpt);
      rows.push({
        question: pair.question,
        groundTruth: pair.answer,
        answer: result.answer,
        contexts,
        status: result.status,
      });
      log.info(
        { event: 'eval_answered', status: result.status, chars: result.answer.length, contexts: contexts.length },
        'Generated answer'
      );
    } catch (error) {
      log.error({ event: 'eval_failed', error: toErrorMessage(error) }, 'Failed to process question');
      rows.push({
        question: pair.question,
        groundTruth: pair.answer,
        answer: FAILED_ANSWER,
        contexts: [],
        status: 'error',
      });
    }
  }

  return rows;
}

export function summarizeEvaluation(rows: EvaluationRow[]): EvaluationSummary {
  const byStatus: Record<EvaluationStatus, number> = {
    success: 0,
    blocked: 0,
    no_results: 0,
    error: 0,
  };
  let contextTotal = 0;

  for (const row of rows) {
    byStatus[row.status] += 1;
    contextTotal += row.contexts.length;
  }

  return {
    total: rows.length,
    byStatus,
    averageContexts: rows.length === 0 ? 0 : contextTotal / rows.length,
  };
}
