/**
 * Format parsing and output for jqr
 *
 * JSON in and out, plus conversion between JSON and YAML.
 */

import YAML from "yaml";
import {
  getErrorMessage,
  InvalidJsonError,
  InvalidYamlError,
  SerializationError,
} from "./errors.js";
import { selectOrPassThrough } from "./query/index.js";
import type { JsonValue } from "./types.js";

export interface FormatOptions {
  /** Indentation width for pretty output */
  indent: number;
  /** Write JSON on a single line */
  compact: boolean;
}

export const defaultFormatOptions: FormatOptions = {
  indent: 2,
  compact: false,
};

/**
 * Parse JSON text. Throws InvalidJsonError with the parser's message.
 */
export function parseJson(input: string): JsonValue {
  try {
    return JSON.parse(input);
  } catch (e) {
    throw new InvalidJsonError(getErrorMessage(e));
  }
}

/**
 * Parse YAML text. Blank input is null, like an empty document.
 */
export function parseYaml(input: string): JsonValue {
  if (!input.trim()) return null;
  try {
    return YAML.parse(input);
  } catch (e) {
    throw new InvalidYamlError(getErrorMessage(e));
  }
}

/**
 * Render a value as JSON text.
 */
export function formatJson(
  value: JsonValue,
  options: FormatOptions = defaultFormatOptions,
): string {
  let text: string | undefined;
  try {
    text = options.compact
      ? JSON.stringify(value)
      : JSON.stringify(value, null, options.indent);
  } catch (e) {
    throw new SerializationError(getErrorMessage(e));
  }
  if (text === undefined) {
    throw new SerializationError("value has no JSON representation");
  }
  return text;
}

/**
 * Pretty print JSON text, optionally narrowed by a JSONPath query.
 *
 * @example
 * prettyPrintJson('{"name": "Alice", "age": 25}', "$.name"); // => '"Alice"'
 */
export function prettyPrintJson(
  input: string,
  query?: string,
  options: FormatOptions = defaultFormatOptions,
): string {
  const document = parseJson(input);
  return formatJson(selectOrPassThrough(document, query), options);
}

/**
 * Convert JSON text to YAML text (without a trailing newline).
 * YAML block structure needs an indent of at least 1.
 */
export function convertToYaml(
  input: string,
  options: FormatOptions = defaultFormatOptions,
): string {
  const document = parseJson(input);
  return YAML.stringify(document, {
    indent: Math.max(1, options.indent),
  }).trimEnd();
}

/**
 * Convert YAML text to JSON text.
 */
export function convertToJson(
  input: string,
  options: FormatOptions = defaultFormatOptions,
): string {
  return formatJson(parseYaml(input), options);
}
