export {
  getErrorMessage,
  InputParseError,
  InvalidJsonError,
  InvalidYamlError,
  JqrError,
  QueryEvaluationError,
  SerializationError,
} from "./errors.js";
export type { FormatOptions } from "./formats.js";
export {
  convertToJson,
  convertToYaml,
  defaultFormatOptions,
  formatJson,
  parseJson,
  parseYaml,
  prettyPrintJson,
} from "./formats.js";
export type { JqrMode, JqrOptions } from "./jqr.js";
export { defaultJqrOptions, jqrCommand, VERSION } from "./jqr.js";
export * from "./query/index.js";
export type {
  Command,
  CommandContext,
  ExecResult,
  JqrLogger,
  JsonObject,
  JsonValue,
} from "./types.js";
