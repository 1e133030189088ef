import { z } from "zod";
import { errorMessage } from "@medeval/shared";
import { RESPONDER_BACKOFF_MS, isCheckpointIndex } from "../config.js";
import {
  loadCheckpoint,
  saveCheckpoint,
  type AnswerRecord,
} from "../checkpoint/checkpointStore.js";
import type { Item } from "../datasets/items.js";
import { buildResponderTurns } from "../prompts/responder.js";
import { rangeIndices, resolveRange } from "./range.js";
import {
  resolveStage,
  type StageDependencies,
  type StageOptions,
} from "./stage.js";

/**
 * Fills in responder answers for every index in range that the checkpoint
 * at `outPath` does not already hold. A failed request is logged, followed
 * by a fixed backoff, and the index is left for a later run.
 */
export async function generateAnswers(
  items: readonly Item[],
  options: StageOptions,
  deps: StageDependencies,
): Promise<AnswerRecord> {
  const { client, sleep, log } = resolveStage("generate", deps);
  const answers = await loadCheckpoint(options.outPath, z.string());
  const range = resolveRange(items.length, options.start, options.end);

  log.info("Generating answers", {
    model: client.model,
    start: range.start,
    end: range.end,
    resumed: Object.keys(answers).length,
  });

  let generated = 0;
  let failed = 0;
  for (const index of rangeIndices(range)) {
    const key = String(index);
    const item = items[index];
    if (!item || answers[key] !== undefined) {
      continue;
    }

    try {
      const reply = await client.complete(buildResponderTurns(item.question));
      answers[key] = reply.trim();
      generated++;
      await sleep(options.rateLimitMs);
    } catch (error) {
      failed++;
      log.error("Responder request failed; backing off", {
        index,
        error: errorMessage(error),
        backoffMs: RESPONDER_BACKOFF_MS,
      });
      await sleep(RESPONDER_BACKOFF_MS);
      continue;
    }

    if (isCheckpointIndex(index)) {
      await saveCheckpoint(answers, options.outPath);
    }
  }

  await saveCheckpoint(answers, options.outPath);
  log.info("Answer generation finished", { generated, failed });
  return answers;
}
