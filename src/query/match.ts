/**
 * Matches produced by evaluating a path against a document.
 *
 * Provenance decides how a match becomes output: a borrowed value still
 * belongs to the document and is copied, a synthesized value is already
 * owned, an absent match stands for JSON null.
 */

import type { JsonValue } from "../types.js";
import { cloneJson } from "./safe-object.js";

export interface BorrowedMatch {
  kind: "borrowed";
  /** The value inside the document, not a copy */
  value: JsonValue;
  location: string;
}

export interface SynthesizedMatch {
  kind: "synthesized";
  value: JsonValue;
}

export interface AbsentMatch {
  kind: "absent";
  location: string;
}

export type Match = BorrowedMatch | SynthesizedMatch | AbsentMatch;

export function borrowed(value: JsonValue, location: string): BorrowedMatch {
  return { kind: "borrowed", value, location };
}

export function synthesize(value: JsonValue): SynthesizedMatch {
  return { kind: "synthesized", value };
}

export function absent(location: string): AbsentMatch {
  return { kind: "absent", location };
}

/**
 * Turn a match into an output value that shares nothing with the document.
 */
export function resolveMatch(match: Match): JsonValue {
  switch (match.kind) {
    case "borrowed":
      return cloneJson(match.value);
    case "synthesized":
      return match.value;
    case "absent":
      return null;
    default: {
      const _exhaustive: never = match;
      throw new Error(`Unknown match kind: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/** Location of a match, or null when it has none in the document. */
export function matchLocation(match: Match): string | null {
  return match.kind === "synthesized" ? null : match.location;
}
