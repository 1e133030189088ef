#!/usr/bin/env tsx

import {
  MODEL_CONFIG,
  assertProviderCredentials,
  createChatClient,
  type ModelProvider,
} from "@medeval/core";
import { errorMessage } from "@medeval/shared";
import { formatAverage, formatHistogram } from "../pipeline/aggregate.js";
import { runEvaluation } from "../pipeline/runEvaluation.js";
import { parseCliArgs, usage } from "./cliArgs.js";

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.help) {
    console.log(usage());
    return;
  }

  const providers: ModelProvider[] = [];
  if (!options.skipGenerate) providers.push(options.responderProvider);
  if (!options.skipJudge) providers.push(options.judgeProvider);
  assertProviderCredentials(providers);

  const responder = options.skipGenerate
    ? undefined
    : createChatClient({
        provider: options.responderProvider,
        model: options.responderModel,
        temperature: options.temperature,
      });
  const judge = options.skipJudge
    ? undefined
    : createChatClient({
        ...MODEL_CONFIG.judge,
        provider: options.judgeProvider,
        model: options.judgeModel,
      });

  const summary = await runEvaluation(
    {
      input: options.input,
      outdir: options.outdir,
      start: options.start,
      end: options.end,
      rateLimitMs: options.rateLimitS * 1000,
      skipGenerate: options.skipGenerate,
      skipJudge: options.skipJudge,
    },
    { responder, judge },
  );

  if (summary.skippedJudge || !summary.histogram) {
    console.log("Judge phase skipped.");
    return;
  }

  console.log(formatAverage({ mean: summary.mean, count: summary.judged }));
  for (const line of formatHistogram(summary.histogram)) {
    console.log(line);
  }
  if (summary.failed > 0) {
    console.log(
      `${summary.failed} items failed judging (see judge_failures.json); rerun to retry them.`,
    );
  }
}

main().catch((error) => {
  console.error("Fatal error:", errorMessage(error));
  process.exit(1);
});
