/** Checkpoint file names, relative to the output directory. */
export const OUTPUT_FILES = {
  answers: "model_answers.json",
  scores: "judge_scores.json",
  judgeFailures: "judge_failures.json",
} as const;

/** Checkpoints are flushed after every index with `index % 10 === 9`. */
export const CHECKPOINT_INTERVAL = 10;

/** Fixed pause after a failed responder request. */
export const RESPONDER_BACKOFF_MS = 10_000;

/** Fixed pause after a failed judge request. */
export const JUDGE_BACKOFF_MS = 5_000;

export const EVAL_DEFAULTS = {
  input: "dataset/MAIA.json",
  outdir: "./res",
  temperature: 0.1,
  rateLimitS: 1.0,
  start: 0,
} as const;

/** True when a checkpoint flush is due after processing `index`. */
export function isCheckpointIndex(index: number): boolean {
  return index % CHECKPOINT_INTERVAL === CHECKPOINT_INTERVAL - 1;
}
