export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";
export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta | Error): void;
  child(bindings: { category?: string; meta?: LogMeta }): Logger;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 100,
};

/**
 * Resolve log level from arbitrary input.
 * Returns 'silent' for invalid or missing values.
 */
export function resolveLogLevel(level: unknown): LogLevel {
  if (!level) {
    return "silent";
  }
  const normalized = String(level).toLowerCase();
  switch (normalized) {
    case "trace":
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "silent":
      return normalized;
    default:
      return "silent";
  }
}

export function createNoOpLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => createNoOpLogger(),
  };
}

export type ConsoleLoggerOptions = {
  level?: LogLevel;
  category?: string;
  meta?: LogMeta;
  /** Defaults to the global console. */
  console?: Pick<Console, "debug" | "info" | "warn" | "error">;
};

export function createConsoleLogger(opts: ConsoleLoggerOptions = {}): Logger {
  const level = opts.level ?? "info";
  const out = opts.console ?? console;
  const bound = opts.meta ?? {};
  const prefix = opts.category ? `[${opts.category}] ` : "";

  const enabled = (at: LogLevel): boolean =>
    level !== "silent" && LEVEL_WEIGHT[at] >= LEVEL_WEIGHT[level];

  const merge = (meta?: LogMeta): LogMeta | undefined => {
    const merged = { ...bound, ...meta };
    return Object.keys(merged).length > 0 ? merged : undefined;
  };

  const write = (
    at: "debug" | "info" | "warn" | "error",
    msg: string,
    meta?: LogMeta
  ): void => {
    if (!enabled(at)) return;
    const merged = merge(meta);
    if (merged) {
      out[at](`${prefix}${msg}`, merged);
    } else {
      out[at](`${prefix}${msg}`);
    }
  };

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, metaOrError) => {
      if (metaOrError instanceof Error) {
        write("error", msg, { error: metaOrError.message });
        return;
      }
      write("error", msg, metaOrError);
    },
    child: (bindings) =>
      createConsoleLogger({
        level,
        console: out,
        category: bindings.category ?? opts.category,
        meta: { ...bound, ...bindings.meta },
      }),
  };
}
