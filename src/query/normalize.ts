/**
 * Result normalizer.
 *
 * Folds a match sequence into one JSON value:
 *
 *   compile failed  -> "Invalid JSONPath query"
 *   no matches      -> "No results found"
 *   one match       -> the resolved value, never wrapped
 *   several matches -> array of resolved values, in match order
 *
 * Internally the result is a tagged QueryOutcome; the sentinel strings only
 * appear once an outcome is flattened for output.
 */

import { QueryEvaluationError } from "../errors.js";
import type { JsonValue } from "../types.js";
import { compilePath } from "./compile.js";
import { type Match, matchLocation, resolveMatch } from "./match.js";
import { evaluate } from "./select.js";

export const NO_RESULTS_FOUND = "No results found";
export const INVALID_JSONPATH_QUERY = "Invalid JSONPath query";

export type QueryOutcome =
  | { kind: "value"; value: JsonValue; count: number }
  | { kind: "empty" }
  | { kind: "invalidQuery"; error: string };

export interface ResolvedMatch {
  value: JsonValue;
  /** JSONPath location, null for values computed outside the document */
  location: string | null;
}

export type QueryAllResult =
  | { ok: true; matches: ResolvedMatch[] }
  | { ok: false; error: string };

/**
 * Collapse a match sequence by cardinality. Absent matches resolve to null
 * in every position, including inside a plural result.
 */
export function collapse(matches: readonly Match[]): QueryOutcome {
  if (matches.length === 0) {
    return { kind: "empty" };
  }
  if (matches.length === 1) {
    return { kind: "value", value: resolveMatch(matches[0]), count: 1 };
  }
  return {
    kind: "value",
    value: matches.map(resolveMatch),
    count: matches.length,
  };
}

export function flattenOutcome(outcome: QueryOutcome): JsonValue {
  switch (outcome.kind) {
    case "value":
      return outcome.value;
    case "empty":
      return NO_RESULTS_FOUND;
    case "invalidQuery":
      return INVALID_JSONPATH_QUERY;
    default: {
      const _exhaustive: never = outcome;
      throw new Error(`Unknown outcome: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Normalize a match sequence, or `null` when the path failed to compile.
 */
export function normalize(matches: readonly Match[] | null): JsonValue {
  if (matches === null) {
    return INVALID_JSONPATH_QUERY;
  }
  return flattenOutcome(collapse(matches));
}

function select(
  document: JsonValue,
  query: string,
): { ok: true; matches: Match[] } | { ok: false; error: string } {
  const compiled = compilePath(query);
  if (!compiled.ok) {
    return compiled;
  }
  try {
    return { ok: true, matches: evaluate(document, compiled.path) };
  } catch (e) {
    if (e instanceof QueryEvaluationError) {
      return { ok: false, error: e.message };
    }
    throw e;
  }
}

/**
 * Compile and evaluate `query` against `document`.
 */
export function runQuery(document: JsonValue, query: string): QueryOutcome {
  const selected = select(document, query);
  if (!selected.ok) {
    return { kind: "invalidQuery", error: selected.error };
  }
  return collapse(selected.matches);
}

/**
 * Query a document and return a single JSON value, with the sentinel
 * strings standing in for an empty selection or an invalid query.
 *
 * @example
 * extractJsonPath({ pets: [{ name: "Rex" }, { name: "Tom" }] }, "$.pets[*].name");
 * // => ["Rex", "Tom"]
 */
export function extractJsonPath(document: JsonValue, query: string): JsonValue {
  return flattenOutcome(runQuery(document, query));
}

/**
 * Without a query the document itself is the result, unmodified and
 * uncopied.
 */
export function selectOrPassThrough(
  document: JsonValue,
  query: string | undefined,
): JsonValue {
  if (query === undefined) {
    return document;
  }
  return extractJsonPath(document, query);
}

/**
 * Query without collapsing: always a list of matches with their locations,
 * so callers never have to infer cardinality from the value's shape.
 */
export function queryAll(document: JsonValue, query: string): QueryAllResult {
  const selected = select(document, query);
  if (!selected.ok) {
    return selected;
  }
  return {
    ok: true,
    matches: selected.matches.map((match) => ({
      value: resolveMatch(match),
      location: matchLocation(match),
    })),
  };
}
