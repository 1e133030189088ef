import type { z } from "zod";
import { ExternalServiceError } from "./errors.js";
import { createLogger } from "./logger.js";
import { sleep } from "./sleep.js";

const logger = createLogger({ service: "http" });

/** Linear backoff step between attempts: 1 s, 2 s, 3 s, ... */
const RETRY_STEP_MS = 1000;

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface JsonRequest {
  /** Short service name used in log lines and error messages. */
  service: string;
  url: string;
  /** Sent as a JSON POST body when present; the request is a GET otherwise. */
  body?: unknown;
  timeoutMs: number;
  maxRetries: number;
}

/**
 * Appends query parameters to a base URL, skipping `undefined` values.
 * Parameter order follows insertion order of `params`.
 */
export function buildUrl(base: string, params: QueryParams = {}): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

async function send(request: JsonRequest): Promise<Response> {
  const { service, url, body, timeoutMs, maxRetries } = request;
  const attempts = maxRetries + 1;
  let lastFailure = "no response";
  let lastStatus: number | undefined;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const response = await fetch(url, {
        signal: AbortSignal.timeout(timeoutMs),
        ...(body === undefined
          ? {}
          : {
              method: "POST",
              headers: { "Content-Type": "application/json" },
              body: JSON.stringify(body),
            }),
      });
      if (response.ok) {
        return response;
      }

      lastStatus = response.status;
      lastFailure = `HTTP ${response.status}`;
      if (!isRetryableStatus(response.status)) {
        break;
      }
    } catch (error) {
      lastStatus = undefined;
      lastFailure = error instanceof Error ? error.message : String(error);
    }

    if (attempt < attempts) {
      logger.warn(`${service} request failed, retrying`, {
        url,
        attempt,
        failure: lastFailure,
      });
      await sleep(RETRY_STEP_MS * attempt);
    }
  }

  throw new ExternalServiceError(`${service} request failed: ${lastFailure}`, {
    code: "HTTP_REQUEST_FAILED",
    statusCode: lastStatus,
    context: { service, url },
  });
}

/**
 * Sends a request and validates the JSON body against `schema`. Network
 * errors, timeouts, 408, 429 and 5xx responses are retried up to
 * `maxRetries` times with a linear backoff.
 *
 * @throws {ExternalServiceError} When the request keeps failing, the body is
 *   not JSON, or the JSON does not match `schema`
 */
export async function requestJson<T>(
  request: JsonRequest,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  const response = await send(request);

  let data: unknown;
  try {
    data = await response.json();
  } catch (error) {
    throw new ExternalServiceError(
      `${request.service} returned a body that is not JSON`,
      {
        code: "INVALID_JSON_RESPONSE",
        statusCode: response.status,
        cause: error instanceof Error ? error : undefined,
        context: { url: request.url },
      },
    );
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ExternalServiceError(`Unexpected ${request.service} response`, {
      code: "UNEXPECTED_RESPONSE",
      context: {
        url: request.url,
        issues: parsed.error.issues.slice(0, 3).map((issue) => issue.message),
      },
    });
  }
  return parsed.data;
}
