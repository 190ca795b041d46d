export {
  loadGroundTruth,
  parseGroundTruth,
  qaPairSchema,
  type QAPair,
} from './groundtruth';

export {
  runEvaluation,
  summarizeEvaluation,
  FAILED_ANSWER,
  type EvaluationRow,
  type EvaluationStatus,
  type EvaluationSummary,
} from './evaluation';
