/**
 * Error classes for jqr.
 *
 * Query failures never surface here: an invalid path or an empty selection
 * is an ordinary result. These errors cover the input and output text
 * boundaries, and each carries the exit code the command reports.
 */

/**
 * Extract message from an unknown error value.
 * Handles both Error instances and other thrown values.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Base class for errors the command reports instead of re-throwing.
 */
export abstract class JqrError extends Error {
  abstract readonly exitCode: number;
}

/**
 * Input text could not be parsed. `label` names the format and `detail`
 * carries the parser's own message, so the two can be styled separately.
 */
export abstract class InputParseError extends JqrError {
  static readonly EXIT_CODE = 3;
  readonly exitCode = InputParseError.EXIT_CODE;

  constructor(
    public readonly label: string,
    public readonly detail: string,
  ) {
    super(`${label}: ${detail}`);
  }
}

export class InvalidJsonError extends InputParseError {
  readonly name = "InvalidJsonError";

  constructor(detail: string) {
    super("Invalid JSON", detail);
  }
}

export class InvalidYamlError extends InputParseError {
  readonly name = "InvalidYamlError";

  constructor(detail: string) {
    super("Invalid YAML", detail);
  }
}

/**
 * A result value could not be rendered as text.
 */
export class SerializationError extends JqrError {
  static readonly EXIT_CODE = 4;
  readonly name = "SerializationError";
  readonly exitCode = SerializationError.EXIT_CODE;

  constructor(public readonly detail: string) {
    super(`Serialization error: ${detail}`);
  }
}

/**
 * The path engine failed while evaluating an expression it had accepted,
 * e.g. a filter script it cannot run.
 */
export class QueryEvaluationError extends Error {
  readonly name = "QueryEvaluationError";

  constructor(
    public readonly query: string,
    detail: string,
  ) {
    super(`cannot evaluate '${query}': ${detail}`);
  }
}
