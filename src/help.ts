import type { ExecResult } from "./types.js";

export interface HelpInfo {
  name: string;
  summary: string;
  usage: string;
  description?: string[];
  options?: string[];
  examples?: string[];
}

export function showHelp(info: HelpInfo): ExecResult {
  let output = `${info.name} - ${info.summary}\n\n`;
  output += `Usage: ${info.usage}\n`;
  if (info.description && info.description.length > 0) {
    output += "\nDescription:\n";
    for (const line of info.description) {
      output += line ? `  ${line}\n` : "\n";
    }
  }
  if (info.options && info.options.length > 0) {
    output += "\nOptions:\n";
    for (const opt of info.options) {
      output += `  ${opt}\n`;
    }
  }
  if (info.examples && info.examples.length > 0) {
    output += "\nExamples:\n";
    for (const example of info.examples) {
      output += `  ${example}\n`;
    }
  }
  return { stdout: output, stderr: "", exitCode: 0 };
}

export function hasHelpFlag(args: string[]): boolean {
  return args.includes("--help") || args.includes("-h");
}

/**
 * Returns an error result for an unknown option
 */
export function unknownOption(cmdName: string, option: string): ExecResult {
  // For single-char options, use "invalid option -- 'x'" format
  // For long options, use "unrecognized option '--xxx'" format
  const msg = option.startsWith("--")
    ? `unrecognized option '${option}'`
    : `invalid option -- '${option.replace(/^-/, "")}'`;
  return usageError(cmdName, msg);
}

export function usageError(cmdName: string, message: string): ExecResult {
  return {
    stdout: "",
    stderr: `${cmdName}: ${message}\nTry '${cmdName} --help' for more information.\n`,
    exitCode: 1,
  };
}
