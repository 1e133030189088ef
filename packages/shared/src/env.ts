import { z } from "zod";
import { MissingCredentialsError } from "./errors.js";

/**
 * Retrieves a required environment variable. Throws if the variable is not set
 * or is an empty string.
 */
export function getRequiredEnv(key: string): string {
  const value = process.env[key];
  if (value === undefined || value === "") {
    throw new MissingCredentialsError(
      `Missing required environment variable: ${key}`,
      { context: { key } },
    );
  }
  return value;
}

/**
 * Retrieves an optional environment variable with an optional default value.
 * Returns `undefined` if the variable is not set and no default is provided.
 */
export function getOptionalEnv(
  key: string,
  defaultValue?: string,
): string | undefined {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  return value;
}

/**
 * Resolve a secret by checking `envKey` first, then each alias in order.
 * Providers that accept more than one variable name (e.g. `GOOGLE_API_KEY`
 * and `GEMINI_API_KEY`) list the extras as aliases.
 */
export function getSecretValue(envKey: string, ...aliases: string[]): string {
  const sources = [envKey, ...aliases];
  for (const key of sources) {
    const value = process.env[key];
    if (value) return value;
  }
  throw new MissingCredentialsError(
    `Missing required secret. Checked: ${sources.join(", ")}`,
    { context: { sources } },
  );
}

/**
 * Returns the UMLS database connection URL.
 *
 * Resolution order:
 *   1. `UMLS_DATABASE_URL`
 *   2. Assembled from `UMLS_DB_HOST` (localhost), `UMLS_DB_PORT` (5432),
 *      `UMLS_DB_USER`, `UMLS_DB_PASSWORD` and `UMLS_DB_NAME` (umls).
 *      User and password are required in this form.
 */
export function getUmlsDatabaseUrl(): string {
  const directUrl = getOptionalEnv("UMLS_DATABASE_URL");
  if (directUrl) {
    return directUrl;
  }

  const host = getOptionalEnv("UMLS_DB_HOST", "localhost");
  const port = parseEnvInt("UMLS_DB_PORT", 5432);
  const user = getRequiredEnv("UMLS_DB_USER");
  const password = getRequiredEnv("UMLS_DB_PASSWORD");
  const database = getOptionalEnv("UMLS_DB_NAME", "umls");

  return `postgresql://${encodeURIComponent(user)}:${encodeURIComponent(password)}@${host}:${port}/${database}`;
}

/**
 * Parses an environment variable as an integer using Zod.
 * Throws with a clear message if set but not a valid integer.
 * Returns `defaultValue` if the variable is unset or empty.
 */
export function parseEnvInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  if (!raw) return defaultValue;
  const result = z.coerce.number().int().safeParse(raw);
  if (!result.success) {
    throw new Error(
      `Invalid integer value for ${key}: "${raw}". Expected a whole number.`,
    );
  }
  return result.data;
}
