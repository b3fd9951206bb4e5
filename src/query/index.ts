export {
  type CompiledPath,
  type CompileResult,
  compilePath,
  formatLocation,
  type PathNode,
  type PathStep,
} from "./compile.js";
export {
  type AbsentMatch,
  absent,
  type BorrowedMatch,
  borrowed,
  type Match,
  matchLocation,
  resolveMatch,
  type SynthesizedMatch,
  synthesize,
} from "./match.js";
export {
  collapse,
  extractJsonPath,
  flattenOutcome,
  INVALID_JSONPATH_QUERY,
  NO_RESULTS_FOUND,
  normalize,
  type QueryAllResult,
  type QueryOutcome,
  queryAll,
  type ResolvedMatch,
  runQuery,
  selectOrPassThrough,
} from "./normalize.js";
export { evaluate, locate } from "./select.js";
