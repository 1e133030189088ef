import { z } from "zod";
import { JudgeFormatError, errorMessage } from "@medeval/shared";
import { JUDGE_BACKOFF_MS, isCheckpointIndex } from "../config.js";
import {
  judgeFailureSchema,
  loadCheckpoint,
  saveCheckpoint,
  scoreEntrySchema,
  type AnswerRecord,
  type JudgeFailure,
  type JudgeFailureRecord,
  type ScoreRecord,
} from "../checkpoint/checkpointStore.js";
import type { Item } from "../datasets/items.js";
import { buildJudgeTurns, parseJudgeScore } from "../prompts/judge.js";
import { rangeIndices, resolveRange } from "./range.js";
import {
  resolveStage,
  type StageDependencies,
  type StageOptions,
} from "./stage.js";

export interface JudgeAnswersOptions extends StageOptions {
  /** Sidecar record of indices whose last judge attempt failed. */
  failuresPath: string;
}

export interface JudgeDependencies extends StageDependencies {
  now?: () => Date;
}

function recordFailure(
  failures: JudgeFailureRecord,
  key: string,
  kind: JudgeFailure["kind"],
  message: string,
  at: Date,
): void {
  failures[key] = {
    kind,
    message,
    attempts: (failures[key]?.attempts ?? 0) + 1,
    lastAttemptAt: at.toISOString(),
  };
}

/**
 * Scores responder answers against reference answers for every index in
 * range not already present in the score checkpoint. A reply without a
 * score and a failed request both leave the index unscored and are noted
 * in the failure sidecar; a request failure also triggers a fixed backoff.
 */
export async function judgeAnswers(
  items: readonly Item[],
  answers: Readonly<AnswerRecord>,
  options: JudgeAnswersOptions,
  deps: JudgeDependencies,
): Promise<ScoreRecord> {
  const { client, sleep, log } = resolveStage("judge", deps);
  const now = deps.now ?? (() => new Date());

  const scores = await loadCheckpoint(options.outPath, scoreEntrySchema);
  const failures = await loadCheckpoint(
    options.failuresPath,
    judgeFailureSchema,
  );
  let failuresChanged = false;
  const range = resolveRange(items.length, options.start, options.end);

  const flush = async (): Promise<void> => {
    await saveCheckpoint(scores, options.outPath);
    if (failuresChanged) {
      await saveCheckpoint(failures, options.failuresPath);
      failuresChanged = false;
    }
  };

  log.info("Judging answers", {
    model: client.model,
    start: range.start,
    end: range.end,
    resumed: Object.keys(scores).length,
  });

  let judged = 0;
  for (const index of rangeIndices(range)) {
    const key = String(index);
    const item = items[index];
    if (!item || scores[key] !== undefined) {
      continue;
    }

    const turns = buildJudgeTurns({
      question: item.question,
      referenceAnswer: item.answer,
      modelAnswer: answers[key] ?? "",
    });

    try {
      const raw = (await client.complete(turns)).trim();
      const score = parseJudgeScore(raw);
      if (score === undefined) {
        const error = new JudgeFormatError(raw);
        log.warn(error.message, { index, raw });
        recordFailure(failures, key, "format", error.message, now());
        failuresChanged = true;
        continue;
      }

      scores[key] = { score, explanation: raw };
      judged++;
      if (failures[key]) {
        delete failures[key];
        failuresChanged = true;
      }
      await sleep(options.rateLimitMs);
    } catch (error) {
      const message = errorMessage(error);
      log.error("Judge request failed; backing off", {
        index,
        error: message,
        backoffMs: JUDGE_BACKOFF_MS,
      });
      recordFailure(failures, key, "request", message, now());
      failuresChanged = true;
      await sleep(JUDGE_BACKOFF_MS);
      continue;
    }

    if (isCheckpointIndex(index)) {
      await flush();
    }
  }

  await flush();
  log.info("Judging finished", {
    judged,
    failed: Object.keys(failures).length,
  });
  return scores;
}
