#!/usr/bin/env node

import fs from "node:fs";
import path from "node:path";
import { Config } from "./config";
import { disassemble } from "./disassembler";
import { compile } from "./index";
import { VM } from "./vm";

export type Command = "run" | "ir";

export interface CLIOptions {
  command: Command;
  file: string;
  trace: boolean;
  config: Partial<Config>;
}

export class UsageError extends Error {}

export const usage = [
  "Usage: ferret <run|ir> <file> [options]",
  "Options:",
  "  --trace                 Print each executed instruction to stderr",
  "  --unchecked-calls       Skip call target and argument count checks",
  "  --reject-redefinition   Fail when a function is defined twice",
  "  --max-depth <n>         Nested calls allowed before faulting",
  "  --max-steps <n>         Instructions allowed before faulting",
].join("\n");

function count(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || !Number.isSafeInteger(n) || n < 1) {
    throw new UsageError(`${flag} expects a positive integer`);
  }
  return n;
}

export function parseArgs(args: string[]): CLIOptions {
  const [command, file, ...rest] = args;
  if (command !== "run" && command !== "ir") {
    throw new UsageError(`unknown command: ${command ?? "(none)"}`);
  }
  if (!file) throw new UsageError("missing input file");

  const options: CLIOptions = { command, file, trace: false, config: {} };
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    switch (arg) {
      case "--trace":
        options.trace = true;
        break;
      case "--unchecked-calls":
        options.config.checkCalls = false;
        break;
      case "--reject-redefinition":
        options.config.redefinition = "reject";
        break;
      case "--max-depth":
        options.config.maxCallDepth = count(arg, rest[++i]);
        break;
      case "--max-steps":
        options.config.maxSteps = count(arg, rest[++i]);
        break;
      default:
        throw new UsageError(`unknown option: ${arg}`);
    }
  }
  return options;
}

// compiles and, for `run`, executes the source; returns what to print
export function execute(
  options: CLIOptions,
  source: string,
  log: (line: string) => void
): string | null {
  const ir = compile(source, options.config);
  if (options.command === "ir") return disassemble(ir);
  const trace = options.trace ? log : undefined;
  const result = new VM(ir, { ...options.config, trace }).run();
  return result === null ? null : String(result);
}

export function main(args: string[]): number {
  let options: CLIOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(error.message);
    console.error(usage);
    return 2;
  }

  try {
    const source = fs.readFileSync(path.resolve(options.file), "utf8");
    const output = execute(options, source, (line) => console.error(line));
    if (output !== null) console.log(output);
    return 0;
  } catch (error) {
    console.error(
      `${options.command} failed:`,
      error instanceof Error ? error.message : error
    );
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
