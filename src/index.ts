import { build } from "./compiler";
import { Config } from "./config";
import { IR } from "./ir";
import { lex } from "./lexer";
import { parse } from "./parser";
import { VM, VMOptions } from "./vm";

export function compile(source: string, config: Partial<Config> = {}): IR {
  return build(parse(lex(source)), config);
}

export default function run(
  source: string,
  options: VMOptions = {}
): number | null {
  const { trace, ...config } = options;
  return new VM(compile(source, config), { ...config, trace }).run();
}

export * from "./ast";
export * from "./compiler";
export * from "./compiler/errors";
export * from "./config";
export * from "./disassembler";
export * from "./faults";
export * from "./ir";
export * from "./lexer";
export * from "./parser";
export * from "./token";
export * from "./vm";
export { Writer } from "./writer";
