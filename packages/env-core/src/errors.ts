export const ENV_ERROR_CODES = {
  E_ENV_MISSING_VAR: "E_ENV_MISSING_VAR",
  E_ENV_PARSE: "E_ENV_PARSE",
} as const;

export type EnvErrorCode = typeof ENV_ERROR_CODES[keyof typeof ENV_ERROR_CODES];

export const EXIT_CODES = {
  GENERIC: 1,      // generic runtime/software error
  CONFIG: 78,      // EX_CONFIG per sysexits.h
} as const;

const ERROR_CODE_SET: ReadonlySet<string> = new Set<string>(Object.values(ENV_ERROR_CODES));

export const mapEnvErrorToExitCode = (code: string): number => {
  switch (code) {
    case ENV_ERROR_CODES.E_ENV_MISSING_VAR:
    case ENV_ERROR_CODES.E_ENV_PARSE:
      return EXIT_CODES.CONFIG;

    default:
      return EXIT_CODES.GENERIC;
  }
};

export class EnvError extends Error {
  code: EnvErrorCode;
  key: string;
  details?: unknown;

  constructor(code: EnvErrorCode, key: string, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.key = key;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** The variable has no value in the environment. */
export class NotSetError extends EnvError {
  constructor(key: string, details?: unknown) {
    super(
      ENV_ERROR_CODES.E_ENV_MISSING_VAR,
      key,
      `Environment variable \`${key}\` is not set`,
      details
    );
  }
}

export type ParseErrorDetails = {
  key: string;
  value: string;
  type: string;
};

/** The variable is set but its text does not convert to the requested type. */
export class ParseError extends EnvError {
  declare details: ParseErrorDetails;
  value: string;

  constructor(key: string, value: string, type: string) {
    super(
      ENV_ERROR_CODES.E_ENV_PARSE,
      key,
      `Failed to parse environment variable \`${key}\`: ${value}`,
      { key, value, type }
    );
    this.value = value;
  }
}

export function isEnvError(err: unknown): err is EnvError {
  if (!err || typeof err !== "object") return false;
  const code: unknown = Reflect.get(err, "code");
  return typeof code === "string" && ERROR_CODE_SET.has(code);
}

export type SerializedEnvError = {
  name: string;
  message: string;
  code?: string;
  key?: string;
  details?: unknown;
  stack?: string;
};

export function serializeEnvError(
  err: unknown,
  opts: { includeStack?: boolean } = {}
): SerializedEnvError {
  const includeStack = !!opts.includeStack;
  if (err instanceof EnvError) {
    return {
      name: err.name,
      message: err.message,
      code: err.code,
      key: err.key,
      ...(err.details !== undefined ? { details: err.details } : {}),
      ...(includeStack && err.stack ? { stack: err.stack } : {}),
    };
  }
  if (err instanceof Error) {
    return {
      name: err.name || "Error",
      message: err.message,
      ...(includeStack && err.stack ? { stack: err.stack } : {}),
    };
  }
  return {
    name: "Error",
    message: String(err),
  };
}
