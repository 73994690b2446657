/**
 * Read-only key/value lookup over an environment.
 * Accessors depend on this instead of `process.env` so tests can pass a fake.
 */
export interface EnvSource {
  get(name: string): string | undefined;
  entries(): Iterable<[string, string]>;
}

/**
 * Reads `process.env` on every call; nothing is snapshotted.
 * Only own string values count, so `toString` and friends read as unset.
 */
export const processEnvSource: EnvSource = {
  get(name) {
    if (!Object.prototype.hasOwnProperty.call(process.env, name)) return undefined;
    const v = process.env[name];
    return typeof v === "string" ? v : undefined;
  },
  *entries() {
    for (const [k, v] of Object.entries(process.env)) {
      if (typeof v !== "string") continue;
      yield [k, v];
    }
  },
};

/** Fixed in-memory source. The record is copied; `undefined` values count as unset. */
export function createEnvSource(record: Record<string, string | undefined>): EnvSource {
  const values = new Map<string, string>();
  for (const [k, v] of Object.entries(record)) {
    if (v !== undefined) values.set(k, v);
  }
  return {
    get: (name) => values.get(name),
    entries: () => values.entries(),
  };
}
