import { errorMessage, type Logger } from "@medeval/shared";

/** Serializes a tool result for the model. */
export function toToolOutput(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Logs a tool failure and returns the sentence handed back to the model in
 * place of a result. Tools never throw into the agent loop.
 */
export function toolErrorOutput(
  log: Logger,
  action: string,
  error: unknown,
): string {
  const message = errorMessage(error);
  log.error(`${action} failed`, { error: message });
  return `${action} failed: ${message}.`;
}
