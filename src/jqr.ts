/**
 * jqr - pretty-print and query JSON data
 *
 * Reads JSON from a file or stdin, optionally narrows it with a JSONPath
 * query, and prints indented JSON. Also converts JSON to YAML and back.
 */

import { getErrorMessage, InputParseError, JqrError } from "./errors.js";
import {
  convertToJson,
  convertToYaml,
  defaultFormatOptions,
  type FormatOptions,
  formatJson,
  parseJson,
} from "./formats.js";
import { hasHelpFlag, showHelp, unknownOption, usageError } from "./help.js";
import { flattenOutcome, queryAll, runQuery } from "./query/index.js";
import type { Command, CommandContext, ExecResult, JsonValue } from "./types.js";

export const VERSION = "0.1.0";

const jqrHelp = {
  name: "jqr",
  summary: "pretty-print and query JSON data",
  usage: "jqr [OPTIONS] [FILE] [QUERY]",
  description: [
    "Reads JSON from FILE, or from stdin when FILE is omitted or '-',",
    "and prints it indented. QUERY is a JSONPath expression such as",
    "'$.user.name'. A query with one match prints that value, several",
    "matches print an array, and no match prints \"No results found\".",
  ],
  options: [
    "    --to-yaml            convert JSON input to YAML",
    "    --to-json            convert YAML input to JSON",
    "-c, --compact            compact JSON output",
    "-I, --indent=N           set indent level (default: 2)",
    "    --all                print every match with its location, never collapsed",
    "    --no-color           do not colorize error messages",
    "-h, --help               display this help and exit",
    "    --version            output version information and exit",
  ],
  examples: [
    "jqr data.json",
    "jqr data.json '$.users[*].name'",
    "cat data.json | jqr - '$..price'",
    "jqr --to-yaml data.json",
    "jqr --to-json config.yaml",
  ],
};

// ANSI colors
const colors = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
};

export type JqrMode = "pretty" | "toYaml" | "toJson";

export interface JqrOptions extends FormatOptions {
  mode: JqrMode;
  /** Print the uncollapsed match list instead of the folded value */
  all: boolean;
  /** Colorize error details; false forces plain output */
  color: boolean;
}

export const defaultJqrOptions: JqrOptions = {
  ...defaultFormatOptions,
  mode: "pretty",
  all: false,
  color: true,
};

interface ParsedArgs {
  options: JqrOptions;
  file: string | undefined;
  query: string | undefined;
  version: boolean;
}

function parseIndent(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  return Number.parseInt(value, 10);
}

function parseArgs(args: string[]): ParsedArgs | ExecResult {
  const options: JqrOptions = { ...defaultJqrOptions };
  const positional: string[] = [];
  let version = false;

  for (let i = 0; i < args.length; i++) {
    const a = args[i];

    if (a === "--to-yaml") {
      options.mode = "toYaml";
    } else if (a === "--to-json") {
      options.mode = "toJson";
    } else if (a === "--all") {
      options.all = true;
    } else if (a === "--no-color") {
      options.color = false;
    } else if (a === "--version") {
      version = true;
    } else if (a === "-c" || a === "--compact") {
      options.compact = true;
    } else if (a.startsWith("--indent=") || a === "-I" || a === "--indent") {
      const raw = a.startsWith("--indent=") ? a.slice(9) : args[++i];
      const indent = parseIndent(raw);
      if (indent === null) {
        return usageError("jqr", `invalid indent '${raw ?? ""}'`);
      }
      options.indent = indent;
    } else if (a === "-") {
      positional.push(a);
    } else if (a.startsWith("--")) {
      return unknownOption("jqr", a);
    } else if (a.startsWith("-")) {
      return unknownOption("jqr", a);
    } else {
      positional.push(a);
    }
  }

  if (positional.length > 2) {
    return usageError("jqr", `unexpected argument '${positional[2]}'`);
  }
  const [file, query] = positional;
  return { options, file, query, version };
}

async function readInput(
  file: string | undefined,
  ctx: CommandContext,
): Promise<string | ExecResult> {
  if (file === undefined || file === "-") {
    return ctx.readStdin();
  }
  try {
    return await ctx.readFile(file);
  } catch (e) {
    return {
      stdout: "",
      stderr: `jqr: ${file}: ${getErrorMessage(e)}\n`,
      exitCode: 2,
    };
  }
}

function queryValue(
  document: JsonValue,
  query: string,
  options: JqrOptions,
  ctx: CommandContext,
): JsonValue {
  if (options.all) {
    const result = queryAll(document, query);
    ctx.logger?.info("query", {
      query,
      outcome: result.ok ? "matches" : "invalidQuery",
      count: result.ok ? result.matches.length : 0,
    });
    if (!result.ok) {
      return flattenOutcome({ kind: "invalidQuery", error: result.error });
    }
    return result.matches.map(({ value, location }) => ({ value, location }));
  }

  const outcome = runQuery(document, query);
  ctx.logger?.info("query", {
    query,
    outcome: outcome.kind,
    count: outcome.kind === "value" ? outcome.count : 0,
  });
  return flattenOutcome(outcome);
}

function render(
  input: string,
  query: string | undefined,
  options: JqrOptions,
  ctx: CommandContext,
): string {
  switch (options.mode) {
    case "toYaml":
      return convertToYaml(input, options);
    case "toJson":
      return convertToJson(input, options);
    case "pretty": {
      const document = parseJson(input);
      const value =
        query === undefined
          ? document
          : queryValue(document, query, options, ctx);
      return formatJson(value, options);
    }
    default: {
      const _exhaustive: never = options.mode;
      throw new Error(`Unknown mode: ${_exhaustive}`);
    }
  }
}

function formatError(error: JqrError, color: boolean): string {
  if (color && error instanceof InputParseError) {
    return `jqr: ${error.label}: ${colors.red}${error.detail}${colors.reset}\n`;
  }
  return `jqr: ${error.message}\n`;
}

export const jqrCommand: Command = {
  name: "jqr",

  async execute(args: string[], ctx: CommandContext): Promise<ExecResult> {
    if (hasHelpFlag(args) || (args.length === 0 && ctx.isInteractive)) {
      return showHelp(jqrHelp);
    }

    const parsed = parseArgs(args);
    if ("exitCode" in parsed) return parsed;

    const { options, file, query } = parsed;
    if (parsed.version) {
      return { stdout: `jqr ${VERSION}\n`, stderr: "", exitCode: 0 };
    }
    const color = ctx.color && options.color;

    const input = await readInput(file, ctx);
    if (typeof input !== "string") return input;
    ctx.logger?.debug("input", { bytes: input.length, mode: options.mode });

    try {
      const output = render(input, query, options, ctx);
      return { stdout: `${output}\n`, stderr: "", exitCode: 0 };
    } catch (e) {
      if (e instanceof JqrError) {
        return {
          stdout: "",
          stderr: formatError(e, color),
          exitCode: e.exitCode,
        };
      }
      throw e;
    }
  },
};
