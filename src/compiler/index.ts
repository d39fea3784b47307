import { Block, BlockLine, Expr, Operator, Program, Stmt } from "../ast";
import { Config, resolveConfig } from "../config";
import { BinaryTag, IR, Label, Register } from "../ir";
import { noMatch } from "../utils";
import { Writer } from "../writer";
import {
  BuilderReusedError,
  MissingResultError,
  UnsupportedExpressionError,
  UnsupportedOperatorError,
} from "./errors";
import { LabelState } from "./labels";
import { ScopeStack } from "./scope";

export function build(program: Program, config: Partial<Config> = {}): IR {
  return new IRBuilder(config).build(program);
}

const opcodes: ReadonlyMap<Operator, BinaryTag> = new Map<Operator, BinaryTag>([
  ["add", "add"],
  ["sub", "sub"],
  ["mul", "mul"],
  ["div", "div"],
  ["mod", "mod"],
  ["eq", "cmpEq"],
  ["lt", "cmpLt"],
  ["lte", "cmpLte"],
  ["gt", "cmpGt"],
  ["gte", "cmpGte"],
]);

/**
 * Lowers an AST into a flat instruction list over numbered registers.
 *
 * Calling convention: the caller pushes arguments last-to-first and emits
 * `call`; the callee pops them into its first registers in declaration order,
 * runs its body in a fresh frame, pushes the body's value and returns; the
 * caller pops that value into a new register.
 *
 * Builders are single-use: build one program, then discard the builder.
 */
export class IRBuilder {
  private asm = new Writer();
  private config: Config;
  private labels: LabelState;
  private scopes: ScopeStack;
  private used = false;
  constructor(config: Partial<Config> = {}) {
    this.config = resolveConfig(config);
    this.labels = new LabelState(this.asm, this.config.redefinition);
    this.scopes = new ScopeStack(this.config.frameSize);
  }
  build(program: Program): IR {
    if (this.used) throw new BuilderReusedError();
    this.used = true;
    let result: Register | null = null;
    for (const stmt of program.statements) {
      result = this.stmt(stmt) ?? result;
    }
    if (this.config.checkCalls) this.labels.checkCalls();
    return this.asm.compile(result);
  }
  private stmt(stmt: Stmt): Register | null {
    switch (stmt.tag) {
      case "fnDef":
        this.fnDef(stmt.name, stmt.parameters, stmt.block);
        return null;
      case "line":
        return this.line(stmt.line);
      // istanbul ignore next
      default:
        return noMatch(stmt);
    }
  }
  private fnDef(name: string, parameters: string[], block: Block): void {
    const end = this.labels.create();
    this.asm.jumpI(end);
    this.labels.func(name, parameters.length);

    const scope = this.scopes.push();
    for (const param of parameters) {
      this.asm.pop(scope.variable(param));
    }
    const result = this.block(block);
    if (!result) throw new MissingResultError(name);
    this.asm.push(result).return();
    this.scopes.pop();

    this.asm.label(end);
  }
  private block(block: Block): Register | null {
    let result: Register | null = null;
    for (const line of block) {
      result = this.line(line);
    }
    return result;
  }
  private line(line: BlockLine): Register | null {
    switch (line.tag) {
      case "expr":
        return this.expr(line.expr);
      case "loop": {
        const { block } = line;
        const start = this.labels.create();
        const end = this.labels.create();
        this.asm.label(start);
        this.labels.withLoop(end, () => this.block(block));
        this.asm.jumpI(start).label(end);
        return null;
      }
      case "break":
        this.asm.jumpI(this.labels.breakTarget());
        return null;
      // istanbul ignore next
      default:
        return noMatch(line);
    }
  }
  private expr(expr: Expr): Register {
    switch (expr.tag) {
      case "int":
        return this.loadI(expr.value);
      case "boolean":
        return this.loadI(expr.value ? 1 : 0);
      case "str":
        throw new UnsupportedExpressionError("string");
      case "name":
        return this.scopes.current().variable(expr.value);
      case "assignment": {
        const value = this.expr(expr.expr);
        const target = this.scopes.current().variable(expr.varname);
        this.asm.i2i(value, target);
        return target;
      }
      case "binOp": {
        const lhs = this.expr(expr.lhs);
        const rhs = this.expr(expr.rhs);
        const tag = opcodes.get(expr.operator);
        if (!tag) throw new UnsupportedOperatorError(expr.operator);
        const out = this.allocate();
        this.asm.binary(tag, lhs, rhs, out);
        return out;
      }
      case "fnCall": {
        const args = expr.args.map((arg) => this.expr(arg));
        for (const arg of [...args].reverse()) {
          this.asm.push(arg);
        }
        this.labels.call(expr.name, args.length);
        const out = this.allocate();
        this.asm.pop(out);
        return out;
      }
      case "if":
        return this.ifExpr(expr.cond, expr.trueBlock, expr.falseBlock);
      // istanbul ignore next
      default:
        return noMatch(expr);
    }
  }
  private ifExpr(
    cond: Expr,
    trueBlock: Block,
    falseBlock: Block | null
  ): Register {
    const out = this.allocate();
    const condReg = this.expr(cond);
    const labelTrue = this.labels.create();
    const labelEnd = this.labels.create();
    const labelFalse = this.labels.create();

    this.asm.condBranch(condReg, labelTrue, labelFalse).label(labelTrue);
    this.branch(trueBlock, out, labelEnd);
    this.asm.label(labelFalse);
    this.branch(falseBlock ?? [], out, labelEnd);
    this.asm.label(labelEnd);
    return out;
  }
  // a branch without a value leaves 0 behind
  private branch(block: Block, out: Register, end: Label): void {
    const result = this.block(block);
    if (result) {
      this.asm.i2i(result, out);
    } else {
      this.asm.loadI(0, out);
    }
    this.asm.jumpI(end);
  }
  private allocate(): Register {
    return this.scopes.current().allocate();
  }
  private loadI(value: number): Register {
    const out = this.allocate();
    this.asm.loadI(value, out);
    return out;
  }
}
