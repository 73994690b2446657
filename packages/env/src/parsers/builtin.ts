import { parseMemorySize } from "../memory-size";
import type { EnvParser, ParseOutcome } from "./types";

const INT_RE = /^[+-]?\d+$/;
const UINT_RE = /^\+?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const BOOL_TOKENS: Readonly<Record<string, boolean>> = {
  true: true,
  "1": true,
  yes: true,
  on: true,
  false: false,
  "0": false,
  no: false,
  off: false,
};

const FAILED = { ok: false } as const;

function success<T>(value: T): ParseOutcome<T> {
  return { ok: true, value };
}

/**
 * Build a parser from a function that returns the converted value,
 * or `undefined` when the text is not convertible.
 */
export function defineParser<T>(type: string, fn: (raw: string) => T | undefined): EnvParser<T> {
  return {
    type,
    parse(raw) {
      const value = fn(raw);
      return value === undefined ? FAILED : success(value);
    },
  };
}

export const int: EnvParser<number> = defineParser("int", (raw) => {
  if (!INT_RE.test(raw)) return undefined;
  const n = Number(raw);
  return Number.isSafeInteger(n) ? n : undefined;
});

export const uint: EnvParser<number> = defineParser("uint", (raw) => {
  if (!UINT_RE.test(raw)) return undefined;
  const n = Number(raw);
  return Number.isSafeInteger(n) ? n : undefined;
});

export const u16: EnvParser<number> = defineParser("u16", (raw) => {
  const parsed = uint.parse(raw);
  return parsed.ok && parsed.value <= 0xffff ? parsed.value : undefined;
});

export const float: EnvParser<number> = defineParser("float", (raw) => {
  if (!FLOAT_RE.test(raw)) return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
});

export const bool: EnvParser<boolean> = defineParser("bool", (raw) => {
  const key = raw.toLowerCase();
  return Object.prototype.hasOwnProperty.call(BOOL_TOKENS, key) ? BOOL_TOKENS[key] : undefined;
});

export const string: EnvParser<string> = defineParser("string", (raw) => raw);

export const memorySize: EnvParser<number> = defineParser("memorySize", (raw) => {
  const parsed = parseMemorySize(raw);
  return parsed.ok ? parsed.value : undefined;
});

export function oneOf<const T extends string>(values: readonly T[]): EnvParser<T> {
  return defineParser(`oneOf(${values.join("|")})`, (raw) => values.find((v) => v === raw));
}
