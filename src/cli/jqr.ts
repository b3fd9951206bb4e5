#!/usr/bin/env node
/**
 * jqr command-line entry.
 *
 * Usage:
 *   jqr data.json '$.users[*].name'
 *   cat data.json | jqr
 *
 * Environment:
 *   NO_COLOR    disable colored error messages
 *   JQR_DEBUG   log input and query details to stderr
 */

import { readFile } from "node:fs/promises";
import { jqrCommand } from "../jqr.js";
import type { JqrLogger } from "../types.js";

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

function stderrLogger(): JqrLogger {
  const write = (level: string, message: string, data?: object) => {
    const suffix = data ? ` ${JSON.stringify(data)}` : "";
    process.stderr.write(`[jqr] ${level} ${message}${suffix}\n`);
  };
  return {
    info: (message, data) => write("info", message, data),
    debug: (message, data) => write("debug", message, data),
  };
}

const result = await jqrCommand.execute(process.argv.slice(2), {
  readStdin,
  readFile: (path) => readFile(path, "utf-8"),
  isInteractive: process.stdin.isTTY === true,
  color: !process.env.NO_COLOR && process.stderr.isTTY === true,
  logger: process.env.JQR_DEBUG ? stderrLogger() : undefined,
});

process.stdout.write(result.stdout);
process.stderr.write(result.stderr);
process.exitCode = result.exitCode;
