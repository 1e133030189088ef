import type { ChatClient } from "@medeval/core";
import { logger, sleep, type Logger, type Sleep } from "@medeval/shared";

/** Collaborators shared by the generate and judge stages. */
export interface StageDependencies {
  client: ChatClient;
  sleep?: Sleep;
  logger?: Logger;
}

export interface StageOptions {
  start: number;
  end?: number;
  /** Pause after each successful request. */
  rateLimitMs: number;
  /** Checkpoint file read on entry and flushed during the run. */
  outPath: string;
}

export interface ResolvedStage {
  client: ChatClient;
  sleep: Sleep;
  log: Logger;
}

export function resolveStage(
  stage: string,
  deps: StageDependencies,
): ResolvedStage {
  return {
    client: deps.client,
    sleep: deps.sleep ?? sleep,
    log: (deps.logger ?? logger).child({ stage }),
  };
}
