interface ErrorOptions {
  code?: string | undefined;
  cause?: Error | undefined;
  context?: Record<string, unknown> | undefined;
}

export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown> | undefined;

  constructor(
    message: string,
    options: ErrorOptions & { isOperational?: boolean | undefined } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code ?? "INTERNAL_ERROR";
    this.isOperational = options.isOperational ?? true;
    this.context = options.context;

    // Maintains proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isOperational: this.isOperational,
      ...(this.context ? { context: this.context } : {}),
    };
  }
}

/** Invalid caller input: CLI flags, tool arguments, filter combinations. */
export class ValidationError extends AppError {
  constructor(message = "Validation failed", options: ErrorOptions = {}) {
    super(message, {
      ...options,
      code: options.code ?? "VALIDATION_ERROR",
    });
  }
}

/** The dataset file is neither an item array nor `{ dataset: [...] }`. */
export class DatasetFormatError extends AppError {
  constructor(
    message = "Unsupported dataset format; expected list or {'dataset': [...]}",
    options: ErrorOptions = {},
  ) {
    super(message, {
      ...options,
      code: options.code ?? "DATASET_FORMAT_ERROR",
    });
  }
}

/** A collaborator needs an API key or connection setting that is not configured. */
export class MissingCredentialsError extends AppError {
  constructor(
    message = "Missing required credentials",
    options: ErrorOptions = {},
  ) {
    super(message, {
      ...options,
      code: options.code ?? "MISSING_CREDENTIALS",
    });
  }
}

export class ExternalServiceError extends AppError {
  public readonly statusCode?: number | undefined;

  constructor(
    message = "External service failure",
    options: ErrorOptions & { statusCode?: number | undefined } = {},
  ) {
    super(message, {
      code: options.code ?? "EXTERNAL_SERVICE_ERROR",
      cause: options.cause,
      context: options.context,
    });
    this.statusCode = options.statusCode;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      ...(this.statusCode !== undefined ? { statusCode: this.statusCode } : {}),
    };
  }
}

/** The judge replied without a standalone 0–5 score token. */
export class JudgeFormatError extends AppError {
  public readonly raw: string;

  constructor(raw: string, options: ErrorOptions = {}) {
    super("Judge reply contains no score from 0 to 5", {
      ...options,
      code: options.code ?? "JUDGE_FORMAT_ERROR",
      context: { ...options.context, raw },
    });
    this.raw = raw;
  }
}

/** Narrows an unknown thrown value to a loggable message. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
