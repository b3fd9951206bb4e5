/**
 * Path compiler adapter.
 *
 * Parses a JSONPath string with the `jsonpath` engine's parser and records
 * whether the path is definite: a plain chain of child field names and
 * indices that can select at most one location.
 */

import jp from "jsonpath";
import { getErrorMessage } from "../errors.js";

/** One parsed component as produced by `jp.parse`. */
export interface PathNode {
  expression: { type: string; value: unknown };
  operation?: string;
  scope?: string;
}

/** A location step: an object key or an array index. */
export type PathStep = string | number;

export interface CompiledPath {
  /** The query text the path was compiled from */
  readonly source: string;
  readonly nodes: readonly PathNode[];
  /**
   * Steps below the root when the path is definite, null otherwise.
   * `$.users[0].name` gives `["users", 0, "name"]`.
   */
  readonly steps: readonly PathStep[] | null;
}

export type CompileResult =
  | { ok: true; path: CompiledPath }
  | { ok: false; error: string };

function isPathNode(value: unknown): value is PathNode {
  if (typeof value !== "object" || value === null) return false;
  if (!("expression" in value)) return false;
  const { expression } = value;
  return (
    typeof expression === "object" &&
    expression !== null &&
    "type" in expression &&
    typeof expression.type === "string"
  );
}

/**
 * The step a component selects, or null when it can select more (or other)
 * than one child.
 */
function definiteStep(node: PathNode): PathStep | null {
  if (node.scope !== "child") return null;
  if (node.operation !== "member" && node.operation !== "subscript") {
    return null;
  }
  const { type, value } = node.expression;
  switch (type) {
    case "identifier":
    case "string_literal":
      return typeof value === "string" ? value : null;
    case "numeric_literal":
      return typeof value === "number" ? value : null;
    default:
      // wildcard, slice, union, filter_expression, script_expression
      return null;
  }
}

function definiteSteps(nodes: readonly PathNode[]): PathStep[] | null {
  const steps: PathStep[] = [];
  for (const node of nodes) {
    const step = definiteStep(node);
    if (step === null) return null;
    steps.push(step);
  }
  return steps;
}

/**
 * Compile a JSONPath query. Never throws: a syntax error, or a path that
 * does not start at `$`, is returned as `{ ok: false }`.
 */
export function compilePath(query: string): CompileResult {
  let parsed: unknown;
  try {
    parsed = jp.parse(query);
  } catch (e) {
    return { ok: false, error: getErrorMessage(e) };
  }

  if (!Array.isArray(parsed) || !parsed.every(isPathNode)) {
    return { ok: false, error: "unrecognized path structure" };
  }
  const [root, ...rest] = parsed;
  if (!root || root.expression.type !== "root") {
    return { ok: false, error: "path must start at the root '$'" };
  }

  return {
    ok: true,
    path: { source: query, nodes: parsed, steps: definiteSteps(rest) },
  };
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Render a location as a JSONPath string, e.g. `$.users[0].name`.
 * Keys that are not identifiers are bracketed and quoted; any key,
 * `__proto__` included, renders as plain data.
 */
export function formatLocation(steps: readonly PathStep[]): string {
  let location = "$";
  for (const step of steps) {
    if (typeof step === "number") {
      location += `[${step}]`;
    } else if (IDENTIFIER.test(step)) {
      location += `.${step}`;
    } else {
      location += `[${JSON.stringify(step)}]`;
    }
  }
  return location;
}
