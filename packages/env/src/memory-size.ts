import { ParseError, err, ok } from "@env-accessor/core";
import type { Result } from "@env-accessor/core";

const MEMORY_SIZE_KEY = "memory_size";

const UNITS: ReadonlyArray<readonly [suffix: string, multiplier: number]> = [
  ["KB", 1024],
  ["MB", 1024 * 1024],
  ["GB", 1024 * 1024 * 1024],
];

/**
 * Parse a memory size such as `10MB`, `512kb` or `1GB` into bytes.
 * A bare number is taken as bytes.
 */
export function parseMemorySize(input: string): Result<number, ParseError> {
  const normalized = input.trim().toUpperCase();

  let digits = normalized;
  let multiplier = 1;
  for (const [suffix, factor] of UNITS) {
    if (normalized.endsWith(suffix)) {
      digits = normalized.slice(0, -suffix.length);
      multiplier = factor;
      break;
    }
  }

  if (!/^\d+$/.test(digits)) {
    return err(new ParseError(MEMORY_SIZE_KEY, normalized, "memorySize"));
  }

  const bytes = Number(digits) * multiplier;
  if (!Number.isSafeInteger(bytes)) {
    return err(new ParseError(MEMORY_SIZE_KEY, normalized, "memorySize"));
  }
  return ok(bytes);
}
