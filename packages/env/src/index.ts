// Accessors
export {
  getRequired,
  getOrDefault,
  getParsed,
  getParsedOrDefault,
  getBool,
  getList,
  readEnv,
} from "./env";
export {
  createEnvAccessor,
  isTruthyToken,
  TRUTHY_TOKENS,
  DEFAULT_LIST_SEPARATOR,
} from "./accessor";
export type { EnvAccessor, EnvAccessorOptions } from "./accessor";
export { checkRequired } from "./check";
export type { CheckRequiredOptions, MissingVariables } from "./check";

// Sources
export { processEnvSource, createEnvSource } from "./source/env-source";
export type { EnvSource } from "./source/env-source";

// Parsers
export * as parsers from "./parsers/builtin";
export { defineParser } from "./parsers/builtin";
export type { EnvParser, ParseOutcome, ParsedType } from "./parsers/types";
export { parseMemorySize } from "./memory-size";

// Errors and results live in the core package
export { EnvError, NotSetError, ParseError, ENV_ERROR_CODES, isEnvError, unwrap, unwrapOr } from "@env-accessor/core";
export type { Result } from "@env-accessor/core";
