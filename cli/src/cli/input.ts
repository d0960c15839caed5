/**
 * Parsing of `call` arguments: headers, JSON bodies and `@file` references
 */

import * as fs from "fs";
import { BadParameterError } from "../errors.js";
import type { JsonValue } from "../http/transport.js";
import { resolveUserPath } from "../paths.js";

/**
 * Convert `"key: value"` strings into a header record
 *
 * Splits on the first ':' and trims both sides, so `"a:b:c"` becomes `{ a: "b:c" }`.
 *
 * @example
 * parseHeaderPairs(["Accept: text/plain", "X-Trace:on"]) // { Accept: "text/plain", "X-Trace": "on" }
 */
export function parseHeaderPairs(values: readonly string[]): Record<string, string> {
  const pairs = values.map((item): [string, string] => {
    const separator = item.indexOf(":");
    if (separator < 0) {
      throw new BadParameterError(`${JSON.stringify(item)}: expected "Name: value"`, "--header");
    }
    return [item.slice(0, separator).trim(), item.slice(separator + 1).trim()];
  });
  // fromEntries defines own properties, so a "__proto__" name stays a header
  return Object.fromEntries(pairs);
}

/**
 * If the text starts with '@', treat the rest as a file name and return its contents
 *
 * @throws the file system error when the file cannot be read
 */
export function readFileIfStartsWithAt(text: string): string;
export function readFileIfStartsWithAt(text: string | undefined): string | undefined;
export function readFileIfStartsWithAt(text: string | undefined): string | undefined {
  if (text !== undefined && text.startsWith("@")) {
    return fs.readFileSync(resolveUserPath(text.slice(1)), "utf-8");
  }
  return text;
}

/**
 * Parse a `--body` value: inline JSON or `@file` holding JSON
 *
 * @returns undefined when no body was given
 * @throws {BadParameterError} for unreadable files and invalid JSON
 */
export function parseJsonArgument(value: string | undefined): JsonValue | undefined {
  let text: string | undefined;
  try {
    text = readFileIfStartsWithAt(value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new BadParameterError(reason, "--body", { cause: error });
  }

  if (text === undefined) {
    return undefined;
  }

  try {
    return toJsonValue(JSON.parse(text));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new BadParameterError(`${reason}: text = ${JSON.stringify(text)}`, "--body", { cause: error });
  }
}

function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === "boolean" || typeof value === "number" || typeof value === "string") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }
  if (typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]): [string, JsonValue] => [key, toJsonValue(item)])
    );
  }
  throw new TypeError(`Not a JSON value: ${String(value)}`);
}

/**
 * Collector for repeatable commander options
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
