export {
  type LogLevel,
  type LogFormat,
  type LogContext,
  type Logger,
  createLogger,
  formatPretty,
  logger,
} from "./logger.js";

export {
  AppError,
  ValidationError,
  DatasetFormatError,
  MissingCredentialsError,
  ExternalServiceError,
  JudgeFormatError,
  errorMessage,
} from "./errors.js";

export {
  getRequiredEnv,
  getOptionalEnv,
  getSecretValue,
  getUmlsDatabaseUrl,
  parseEnvInt,
} from "./env.js";

export {
  buildUrl,
  requestJson,
  type JsonRequest,
  type QueryParams,
} from "./http.js";

export { sleep, type Sleep } from "./sleep.js";

export { createPool } from "./pool.js";
