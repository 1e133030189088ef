export {
  OUTPUT_FILES,
  CHECKPOINT_INTERVAL,
  RESPONDER_BACKOFF_MS,
  JUDGE_BACKOFF_MS,
  EVAL_DEFAULTS,
  isCheckpointIndex,
} from "./config.js";

export { itemSchema, loadItems, parseItems, type Item } from "./datasets/items.js";

export {
  answerRecordSchema,
  judgeFailureRecordSchema,
  judgeFailureSchema,
  loadCheckpoint,
  saveCheckpoint,
  scoreEntrySchema,
  scoreRecordSchema,
  type AnswerRecord,
  type JudgeFailure,
  type JudgeFailureRecord,
  type ScoreEntry,
  type ScoreRecord,
} from "./checkpoint/checkpointStore.js";

export {
  RESPONDER_SYSTEM_PROMPT,
  buildResponderTurns,
} from "./prompts/responder.js";

export {
  JUDGE_PROMPT_TEMPLATE,
  JUDGE_SYSTEM_PROMPT,
  buildJudgeTurns,
  normalizeReferenceAnswer,
  parseJudgeScore,
  renderJudgePrompt,
  type JudgePromptInput,
} from "./prompts/judge.js";

export { resolveRange, rangeIndices, type IndexRange } from "./pipeline/range.js";
export type { StageDependencies, StageOptions } from "./pipeline/stage.js";
export { generateAnswers } from "./pipeline/generateAnswers.js";
export {
  judgeAnswers,
  type JudgeAnswersOptions,
  type JudgeDependencies,
} from "./pipeline/judgeAnswers.js";
export {
  SCORE_BANDS,
  formatAverage,
  formatHistogram,
  meanScore,
  summarizeScores,
  type ScoreBand,
  type ScoreSummary,
} from "./pipeline/aggregate.js";
export {
  outputPaths,
  runEvaluation,
  type EvaluationConfig,
  type EvaluationDependencies,
  type EvaluationSummary,
} from "./pipeline/runEvaluation.js";
