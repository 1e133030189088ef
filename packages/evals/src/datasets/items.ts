import { readFile } from "node:fs/promises";
import { z } from "zod";
import { DatasetFormatError } from "@medeval/shared";

/**
 * One question/reference-answer pair. Fields other than `question` are
 * carried through untouched; `answer` may be a string, a list, or absent.
 */
export const itemSchema = z
  .object({
    question: z.string(),
    answer: z.unknown().optional(),
  })
  .passthrough();

export type Item = z.infer<typeof itemSchema>;

const datasetSchema = z.union([
  z.array(itemSchema),
  z.object({ dataset: z.array(itemSchema) }).passthrough(),
]);

/**
 * Accepts either a bare list of items or `{ dataset: [...] }`.
 *
 * @throws {DatasetFormatError} For any other shape
 */
export function parseItems(data: unknown): Item[] {
  const result = datasetSchema.safeParse(data);
  if (!result.success) {
    throw new DatasetFormatError(undefined, {
      context: { issues: result.error.issues.slice(0, 5) },
    });
  }
  return Array.isArray(result.data) ? result.data : result.data.dataset;
}

/**
 * Reads and parses a UTF-8 JSON dataset file.
 *
 * @throws {DatasetFormatError} When the file is not JSON or has the wrong shape
 */
export async function loadItems(path: string): Promise<Item[]> {
  const text = await readFile(path, "utf-8");

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new DatasetFormatError(`Dataset ${path} is not valid JSON`, {
      cause: error instanceof Error ? error : undefined,
      context: { path },
    });
  }
  return parseItems(data);
}
