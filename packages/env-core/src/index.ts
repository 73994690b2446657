// Error handling
export {
  ENV_ERROR_CODES,
  EXIT_CODES,
  EnvError,
  NotSetError,
  ParseError,
  isEnvError,
  mapEnvErrorToExitCode,
  serializeEnvError,
} from "./errors";
export type { EnvErrorCode, ParseErrorDetails, SerializedEnvError } from "./errors";

// Results
export { ok, err, isOk, isErr, unwrap, unwrapOr, mapResult } from "./result";
export type { Ok, Err, Result } from "./result";

// Logging
export { createConsoleLogger, createNoOpLogger, resolveLogLevel } from "./logger";
export type { ConsoleLoggerOptions, LogLevel, LogMeta, Logger } from "./logger";
