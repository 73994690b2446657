import { NotSetError, ParseError, err, ok } from "@env-accessor/core";
import type { EnvError, Result } from "@env-accessor/core";
import type { EnvParser } from "./parsers/types";
import { processEnvSource } from "./source/env-source";
import type { EnvSource } from "./source/env-source";

/** Values `getBool` reads as true, compared case-insensitively. */
export const TRUTHY_TOKENS: readonly string[] = ["true", "1", "yes", "on"];

export const DEFAULT_LIST_SEPARATOR = ",";

export type EnvAccessorOptions = {
  source?: EnvSource;
  listSeparator?: string;
};

export interface EnvAccessor {
  readonly source: EnvSource;
  getRequired(name: string): Result<string, EnvError>;
  getOrDefault(name: string, def: string): string;
  getParsed<T>(name: string, parser: EnvParser<T>): Result<T, EnvError>;
  getParsedOrDefault<T>(name: string, parser: EnvParser<T>, def: T): T;
  getBool(name: string, def?: boolean): boolean;
  getList(name: string, separator?: string): string[];
  readEnv(prefix?: string): Record<string, string>;
}

export function isTruthyToken(value: string): boolean {
  return TRUTHY_TOKENS.includes(value.toLowerCase());
}

export function createEnvAccessor(opts: EnvAccessorOptions = {}): EnvAccessor {
  const source = opts.source ?? processEnvSource;
  const listSeparator = opts.listSeparator ?? DEFAULT_LIST_SEPARATOR;
  if (listSeparator === "") {
    throw new TypeError("listSeparator must be a non-empty string");
  }

  const getRequired = (name: string): Result<string, EnvError> => {
    const value = source.get(name);
    return value === undefined ? err(new NotSetError(name)) : ok(value);
  };

  const getParsed = <T>(name: string, parser: EnvParser<T>): Result<T, EnvError> => {
    const raw = getRequired(name);
    if (!raw.ok) return raw;
    const parsed = parser.parse(raw.value);
    return parsed.ok ? ok(parsed.value) : err(new ParseError(name, raw.value, parser.type));
  };

  return {
    source,
    getRequired,
    getParsed,

    getOrDefault(name, def) {
      return source.get(name) ?? def;
    },

    getParsedOrDefault(name, parser, def) {
      const parsed = getParsed(name, parser);
      return parsed.ok ? parsed.value : def;
    },

    getBool(name, def = false) {
      const value = source.get(name);
      if (value === undefined) return def;
      return isTruthyToken(value);
    },

    getList(name, separator = listSeparator) {
      if (separator === "") {
        throw new TypeError("separator must be a non-empty string");
      }
      const value = source.get(name);
      if (value === undefined || value.trim() === "") return [];
      return value.split(separator).map((item) => item.trim());
    },

    readEnv(prefix) {
      const out: Record<string, string> = {};
      for (const [k, v] of source.entries()) {
        if (!prefix || k.startsWith(prefix)) out[k] = v;
      }
      return out;
    },
  };
}
