/** Accessors bound to the live `process.env`. Use `createEnvAccessor` to read another source. */
import type { EnvError, Result } from "@env-accessor/core";
import { createEnvAccessor } from "./accessor";
import type { EnvParser } from "./parsers/types";

const defaultAccessor = createEnvAccessor();

export function getRequired(name: string): Result<string, EnvError> {
  return defaultAccessor.getRequired(name);
}

export function getOrDefault(name: string, def: string): string {
  return defaultAccessor.getOrDefault(name, def);
}

export function getParsed<T>(name: string, parser: EnvParser<T>): Result<T, EnvError> {
  return defaultAccessor.getParsed(name, parser);
}

export function getParsedOrDefault<T>(name: string, parser: EnvParser<T>, def: T): T {
  return defaultAccessor.getParsedOrDefault(name, parser, def);
}

export function getBool(name: string, def = false): boolean {
  return defaultAccessor.getBool(name, def);
}

export function getList(name: string, separator?: string): string[] {
  return defaultAccessor.getList(name, separator);
}

export function readEnv(prefix?: string): Record<string, string> {
  return defaultAccessor.readEnv(prefix);
}
