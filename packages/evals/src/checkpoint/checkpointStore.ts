import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { errorMessage, logger } from "@medeval/shared";

const log = logger.child({ service: "checkpoint-store" });

export const answerRecordSchema = z.record(z.string());

export const scoreEntrySchema = z.object({
  score: z.number().min(0).max(5),
  explanation: z.string(),
});

export const scoreRecordSchema = z.record(scoreEntrySchema);

export const judgeFailureSchema = z.object({
  kind: z.enum(["format", "request"]),
  message: z.string(),
  attempts: z.number().int().positive(),
  lastAttemptAt: z.string(),
});

export const judgeFailureRecordSchema = z.record(judgeFailureSchema);

/** Item index (decimal string) → responder answer text. */
export type AnswerRecord = z.infer<typeof answerRecordSchema>;
export type ScoreEntry = z.infer<typeof scoreEntrySchema>;
/** Item index (decimal string) → judge score and raw judge reply. */
export type ScoreRecord = z.infer<typeof scoreRecordSchema>;
export type JudgeFailure = z.infer<typeof judgeFailureSchema>;
export type JudgeFailureRecord = z.infer<typeof judgeFailureRecordSchema>;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Loads a checkpoint record whose values match `valueSchema`. A file that
 * is absent, unreadable or not a JSON object yields an empty record.
 * Entries failing `valueSchema` are dropped one by one and the rest kept,
 * so the dropped indices are simply redone. Everything but an absent file
 * is logged.
 */
export async function loadCheckpoint<V>(
  path: string,
  valueSchema: z.ZodType<V, z.ZodTypeDef, unknown>,
): Promise<Record<string, V>> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (!isMissingFile(error)) {
      log.warn("Checkpoint is unreadable; starting empty", {
        path,
        error: errorMessage(error),
      });
    }
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    log.warn("Checkpoint is not valid JSON; starting empty", {
      path,
      error: errorMessage(error),
    });
    return {};
  }

  const entries = z.record(z.unknown()).safeParse(data);
  if (!entries.success) {
    log.warn("Checkpoint is not a JSON object; starting empty", { path });
    return {};
  }

  const record: Record<string, V> = {};
  const dropped: string[] = [];
  for (const [key, value] of Object.entries(entries.data)) {
    const entry = valueSchema.safeParse(value);
    if (entry.success) {
      record[key] = entry.data;
    } else {
      dropped.push(key);
    }
  }
  if (dropped.length > 0) {
    log.warn("Dropped invalid checkpoint entries", { path, dropped });
  }
  return record;
}

/**
 * Persists the full record as 2-space JSON. The content goes to a sibling
 * temp file first and is renamed over `path`, so a reader never sees a
 * partial write.
 */
export async function saveCheckpoint(
  record: Record<string, unknown>,
  path: string,
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmpPath = `${path}.${process.pid}.tmp`;
  await writeFile(tmpPath, JSON.stringify(record, null, 2), "utf-8");
  await rename(tmpPath, path);
}
