import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { ChatClient } from "@medeval/core";
import {
  ValidationError,
  logger,
  type Logger,
  type Sleep,
} from "@medeval/shared";
import { OUTPUT_FILES } from "../config.js";
import {
  judgeFailureSchema,
  loadCheckpoint,
  type AnswerRecord,
} from "../checkpoint/checkpointStore.js";
import { loadItems } from "../datasets/items.js";
import { summarizeScores, type ScoreSummary } from "./aggregate.js";
import { generateAnswers } from "./generateAnswers.js";
import { judgeAnswers } from "./judgeAnswers.js";
import { resolveRange, type IndexRange } from "./range.js";

export interface EvaluationConfig {
  input: string;
  outdir: string;
  start: number;
  end?: number;
  rateLimitMs: number;
  skipGenerate: boolean;
  skipJudge: boolean;
}

export interface EvaluationDependencies {
  /** Required unless generation is skipped. */
  responder?: ChatClient;
  /** Required unless judging is skipped. */
  judge?: ChatClient;
  sleep?: Sleep;
  logger?: Logger;
  now?: () => Date;
}

export interface EvaluationSummary {
  range: IndexRange;
  /** Answers held in the answer checkpoint after the generate stage. */
  answered: number;
  skippedJudge: boolean;
  /** Scores held in the score checkpoint; 0 when judging was skipped. */
  judged: number;
  /** Indices whose last judge attempt failed. */
  failed: number;
  mean: number;
  histogram: ScoreSummary["histogram"] | undefined;
}

export function outputPaths(outdir: string) {
  return {
    answers: join(outdir, OUTPUT_FILES.answers),
    scores: join(outdir, OUTPUT_FILES.scores),
    judgeFailures: join(outdir, OUTPUT_FILES.judgeFailures),
  };
}

/**
 * Loads the dataset, then runs the generate and judge stages in order over
 * the configured range. Either stage can be skipped; a skipped generate
 * stage reuses whatever answer checkpoint is on disk.
 *
 * @throws {DatasetFormatError} When the dataset cannot be read
 * @throws {ValidationError} When a required chat client is missing
 */
export async function runEvaluation(
  config: EvaluationConfig,
  deps: EvaluationDependencies,
): Promise<EvaluationSummary> {
  const log = (deps.logger ?? logger).child({ stage: "driver" });
  const paths = outputPaths(config.outdir);

  if (!config.skipGenerate && !deps.responder) {
    throw new ValidationError(
      "A responder client is required to generate answers",
    );
  }
  if (!config.skipJudge && !deps.judge) {
    throw new ValidationError("A judge client is required to score answers");
  }

  await mkdir(config.outdir, { recursive: true });
  const items = await loadItems(config.input);
  const range = resolveRange(items.length, config.start, config.end);
  log.info("Loaded dataset", { input: config.input, items: items.length });

  const stageOptions = {
    start: config.start,
    end: config.end,
    rateLimitMs: config.rateLimitMs,
  };
  const shared = { sleep: deps.sleep, logger: deps.logger };

  let answers: AnswerRecord;
  if (deps.responder && !config.skipGenerate) {
    answers = await generateAnswers(
      items,
      { ...stageOptions, outPath: paths.answers },
      { client: deps.responder, ...shared },
    );
  } else {
    answers = await loadCheckpoint(paths.answers, z.string());
    log.info("Generation skipped; using stored answers", {
      answered: Object.keys(answers).length,
    });
  }

  if (!deps.judge || config.skipJudge) {
    return {
      range,
      answered: Object.keys(answers).length,
      skippedJudge: true,
      judged: 0,
      failed: 0,
      mean: 0,
      histogram: undefined,
    };
  }

  const scores = await judgeAnswers(
    items,
    answers,
    {
      ...stageOptions,
      outPath: paths.scores,
      failuresPath: paths.judgeFailures,
    },
    { client: deps.judge, ...shared, now: deps.now },
  );
  const failures = await loadCheckpoint(
    paths.judgeFailures,
    judgeFailureSchema,
  );
  const summary = summarizeScores(scores);

  return {
    range,
    answered: Object.keys(answers).length,
    skippedJudge: false,
    judged: summary.count,
    failed: Object.keys(failures).length,
    mean: summary.mean,
    histogram: summary.histogram,
  };
}
