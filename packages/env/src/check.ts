import { NotSetError, createNoOpLogger, err, ok } from "@env-accessor/core";
import type { EnvError, Logger, Result } from "@env-accessor/core";
import { processEnvSource } from "./source/env-source";
import type { EnvSource } from "./source/env-source";

export type CheckRequiredOptions = {
  source?: EnvSource;
  logger?: Logger;
};

export type MissingVariables = {
  missing: string[];
};

/**
 * Check that every name is set.
 *
 * Unlike `getRequired`, all names are looked up before failing, so a single
 * error lists every missing variable (in `details.missing`). The error's
 * `key` is the first missing name.
 */
export function checkRequired(
  names: readonly string[],
  opts: CheckRequiredOptions = {}
): Result<Record<string, string>, EnvError> {
  const source = opts.source ?? processEnvSource;
  const logger = opts.logger ?? createNoOpLogger();

  const found: Record<string, string> = {};
  const missing: string[] = [];
  for (const name of names) {
    const value = source.get(name);
    if (value === undefined) {
      missing.push(name);
      logger.warn("Required environment variable is not set", { key: name });
    } else {
      found[name] = value;
    }
  }

  const [first] = missing;
  if (first !== undefined) {
    const details: MissingVariables = { missing };
    return err(new NotSetError(first, details));
  }

  logger.debug("Required environment variables present", { count: names.length });
  return ok(found);
}
