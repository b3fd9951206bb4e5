/** Any value that can appear in a parsed JSON document. */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Logger interface for query tracing.
 * Implement this interface to receive command logs.
 */
export interface JqrLogger {
  /** Log informational messages (queries and their outcomes) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (input sizes, resolved modes) */
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * Context provided to the command during execution.
 *
 * The command never touches the process directly; the `bin` entry builds
 * this from `process` and tests build it in memory.
 */
export interface CommandContext {
  /** Read the whole of standard input */
  readStdin: () => Promise<string>;
  /** Read a file as UTF-8 text */
  readFile: (path: string) => Promise<string>;
  /** True when standard input is a terminal */
  isInteractive: boolean;
  /** Colorize diagnostics on stderr */
  color: boolean;
  logger?: JqrLogger;
}

export interface Command {
  name: string;
  execute(args: string[], ctx: CommandContext): Promise<ExecResult>;
}
