/**
 * Selection engine.
 *
 * A definite path is followed directly through own properties. Other paths
 * run through `jp.nodes`, and each engine node is presented as a Match.
 * The engine walks properties with the `in` operator, so a node can come
 * from outside the document proper (`length` on an array). Every node is
 * re-located through own properties before it is trusted.
 */

import jp from "jsonpath";
import { getErrorMessage, QueryEvaluationError } from "../errors.js";
import type { JsonValue } from "../types.js";
import { type CompiledPath, formatLocation, type PathStep } from "./compile.js";
import { absent, borrowed, type Match, synthesize } from "./match.js";
import { isJsonObject, safeGet } from "./safe-object.js";

type Located =
  | { kind: "member"; value: JsonValue }
  | { kind: "computed"; value: JsonValue };

function toIndex(step: PathStep, length: number): number | null {
  const index = typeof step === "number" ? step : Number(step);
  if (typeof step === "string" && String(index) !== step) return null;
  if (!Number.isInteger(index) || index < 0 || index >= length) return null;
  return index;
}

/**
 * Follow `steps` from the document root through own members only.
 * An array's `length` in final position is a computed value; anything
 * else that is not a member resolves to undefined.
 */
export function locate(
  document: JsonValue,
  steps: readonly PathStep[],
): Located | undefined {
  let current: JsonValue = document;
  for (let i = 0; i < steps.length; i++) {
    const step = steps[i];
    if (Array.isArray(current)) {
      const index = toIndex(step, current.length);
      if (index !== null) {
        current = current[index];
        continue;
      }
      if (step === "length" && i === steps.length - 1) {
        return { kind: "computed", value: current.length };
      }
      return undefined;
    }
    if (isJsonObject(current)) {
      const next = safeGet(current, String(step));
      if (next === undefined) return undefined;
      current = next;
      continue;
    }
    return undefined;
  }
  return { kind: "member", value: current };
}

function toMatch(located: Located, steps: readonly PathStep[]): Match {
  return located.kind === "computed"
    ? synthesize(located.value)
    : borrowed(located.value, formatLocation(steps));
}

/**
 * A definite path names one location; when nothing is there the result is
 * an explicit absence rather than an empty selection.
 */
function selectDefinite(
  document: JsonValue,
  steps: readonly PathStep[],
): Match[] {
  const located = locate(document, steps);
  return [located ? toMatch(located, steps) : absent(formatLocation(steps))];
}

function engineNodes(
  document: JsonValue,
  path: CompiledPath,
): { path: PathStep[] }[] {
  try {
    return jp.nodes(document, path.source);
  } catch (e) {
    throw new QueryEvaluationError(path.source, getErrorMessage(e));
  }
}

/**
 * Evaluate a compiled path against a document.
 *
 * Matches come back in document order. The document is never modified and
 * borrowed matches refer into it; use `resolveMatch` before handing values
 * out. Throws `QueryEvaluationError` only when the engine cannot run an
 * expression it parsed.
 */
export function evaluate(document: JsonValue, path: CompiledPath): Match[] {
  if (path.steps !== null) {
    return selectDefinite(document, path.steps);
  }
  // The engine only walks objects and arrays
  if (document === null || typeof document !== "object") {
    return [];
  }

  const matches: Match[] = [];
  for (const node of engineNodes(document, path)) {
    const steps = node.path.slice(1);
    const located = locate(document, steps);
    if (located) {
      matches.push(toMatch(located, steps));
    }
  }
  return matches;
}
