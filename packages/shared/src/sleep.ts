/**
 * Resolves after `ms` milliseconds. Non-positive values resolve on the next
 * macrotask.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

export type Sleep = typeof sleep;
