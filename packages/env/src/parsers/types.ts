export type ParseOutcome<T> = { ok: true; value: T } | { ok: false };

/**
 * Textual-parse contract for `getParsed`.
 * `type` names the target type in parse-error details.
 */
export interface EnvParser<T> {
  readonly type: string;
  parse(raw: string): ParseOutcome<T>;
}

export type ParsedType<P> = P extends EnvParser<infer T> ? T : never;
