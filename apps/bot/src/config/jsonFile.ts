import { readFile } from "node:fs/promises";

import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError, errorMessage } from "../errors.js";

export function parseConfig<T extends TSchema>(schema: T, raw: unknown, source: string): Static<T> {
  const value = Value.Default(schema, Value.Clone(raw));
  if (Value.Check(schema, value)) return value;

  const first = Value.Errors(schema, value).First();
  const where = first ? `${first.path || "/"}: ${first.message}` : "invalid document";
  throw new ConfigError(`${source}: ${where}`);
}

export async function loadJsonConfig<T extends TSchema>(schema: T, path: string): Promise<Static<T>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    throw new ConfigError(`Cannot read ${path}: ${errorMessage(e)}`, { cause: e });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`${path} is not valid JSON: ${errorMessage(e)}`, { cause: e });
  }

  return parseConfig(schema, raw, path);
}
