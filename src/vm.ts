import { Config, resolveConfig } from "./config";
import { formatLabel, formatOperation, formatRegister } from "./disassembler";
import {
  ArithmeticFault,
  DuplicateLabelFault,
  FrameStackFault,
  LabelResolutionFault,
  RegisterBoundsFault,
  StackOverflowFault,
  StackUnderflowFault,
  StepLimitFault,
} from "./faults";
import {
  ArithmeticTag,
  BinaryTag,
  IR,
  ImmediateTag,
  Label,
  Operation,
  Register,
  labelKey,
  registersOf,
} from "./ir";
import { int32, noMatch, truncatingDiv } from "./utils";

export type VMOptions = Partial<Config> & {
  // receives one line per executed instruction
  trace?: (line: string) => void;
};

const immediates: Record<ImmediateTag, ArithmeticTag> = {
  addI: "add",
  subI: "sub",
  mulI: "mul",
  divI: "div",
};

class Frame {
  readonly registers: Int32Array;
  constructor(size: number) {
    this.registers = new Int32Array(size);
  }
}

class Program {
  private ip = 0;
  constructor(private instructions: Operation[]) {}
  current(): Operation | undefined {
    return this.instructions[this.ip];
  }
  here(): number {
    return this.ip;
  }
  next(): void {
    this.ip++;
  }
  jump(address: number): void {
    this.ip = address;
  }
}

export function execute(ir: IR, options: VMOptions = {}): number | null {
  return new VM(ir, options).run();
}

export class VM {
  private config: Config;
  private program: Program;
  private trace: ((line: string) => void) | null;
  private labels: Map<string, number> = new Map();
  // frames[0] is the global frame and lives as long as the VM
  private frames: Frame[];
  private returnAddresses: number[] = [];
  private stack: number[] = [];
  private steps = 0;
  constructor(private ir: IR, options: VMOptions = {}) {
    const { trace, ...config } = options;
    this.config = resolveConfig(config);
    this.trace = trace ?? null;
    this.program = new Program(ir.instructions);
    this.frames = [new Frame(this.config.frameSize)];
    ir.instructions.forEach((op, index) => {
      for (const reg of registersOf(op)) {
        this.checkBounds(reg, index, op);
      }
      if (op.tag !== "label") return;
      const key = labelKey(op.label);
      if (this.labels.has(key)) {
        throw new DuplicateLabelFault(
          `label ${formatLabel(op.label)} is declared more than once`,
          index,
          op
        );
      }
      this.labels.set(key, index);
    });
    if (ir.result) this.checkBounds(ir.result, ir.instructions.length, null);
  }
  private checkBounds(reg: Register, ip: number, op: Operation | null): void {
    if (reg.index < 0 || reg.index >= this.config.frameSize) {
      throw new RegisterBoundsFault(
        `register ${formatRegister(reg)} outside a ${
          this.config.frameSize
        }-slot frame`,
        ip,
        op
      );
    }
  }
  // runs until the instruction pointer leaves the program
  run(): number | null {
    let op: Operation | undefined;
    while ((op = this.program.current())) {
      const ip = this.program.here();
      if (this.config.maxSteps !== null && this.steps >= this.config.maxSteps) {
        throw new StepLimitFault(
          `step limit of ${this.config.maxSteps} reached`,
          ip,
          op
        );
      }
      this.steps++;
      this.trace?.(`${ip} ${formatOperation(op)}`);
      this.step(op, ip);
    }
    return this.ir.result ? this.readRegister(this.ir.result) : null;
  }
  readRegister(reg: Register): number {
    const { registers } = this.frameOf(reg);
    if (reg.index < 0 || reg.index >= registers.length) {
      throw new RangeError(`no register ${formatRegister(reg)}`);
    }
    return registers[reg.index];
  }
  private step(op: Operation, ip: number): void {
    switch (op.tag) {
      case "label":
        break;
      case "call": {
        const target = this.resolve(op.label, ip, op);
        if (this.returnAddresses.length >= this.config.maxCallDepth) {
          throw new StackOverflowFault(
            `more than ${this.config.maxCallDepth} nested calls`,
            ip,
            op
          );
        }
        this.returnAddresses.push(ip);
        this.frames.push(new Frame(this.config.frameSize));
        this.program.jump(target);
        return;
      }
      case "return": {
        const address = this.returnAddresses.pop();
        if (address === undefined) {
          throw new StackUnderflowFault("return stack is empty", ip, op);
        }
        // the global frame is never popped
        // istanbul ignore next
        if (this.frames.length <= 1) {
          throw new FrameStackFault("no frame to return from", ip, op);
        }
        this.frames.pop();
        this.program.jump(address + 1);
        return;
      }
      case "push":
        this.stack.push(this.get(op.reg));
        break;
      case "pushI":
        this.stack.push(int32(op.value));
        break;
      case "pop": {
        const value = this.stack.pop();
        if (value === undefined) {
          throw new StackUnderflowFault("operand stack is empty", ip, op);
        }
        this.set(op.reg, value);
        break;
      }
      case "loadI":
        this.set(op.out, op.val);
        break;
      case "i2i":
        this.set(op.rhs, this.get(op.lhs));
        break;
      case "jumpI":
        this.program.jump(this.resolve(op.label, ip, op));
        return;
      case "condBranch": {
        // only an exact 1 counts as true
        const taken = this.get(op.cond) === 1 ? op.labelTrue : op.labelFalse;
        this.program.jump(this.resolve(taken, ip, op));
        return;
      }
      case "addI":
      case "subI":
      case "mulI":
      case "divI": {
        const lhs = this.get(op.lhs);
        this.set(op.out, this.compute(immediates[op.tag], lhs, op.rhs, ip, op));
        break;
      }
      case "add":
      case "sub":
      case "mul":
      case "div":
      case "mod":
      case "cmpEq":
      case "cmpLt":
      case "cmpLte":
      case "cmpGt":
      case "cmpGte": {
        const lhs = this.get(op.lhs);
        const rhs = this.get(op.rhs);
        this.set(op.out, this.compute(op.tag, lhs, rhs, ip, op));
        break;
      }
      // istanbul ignore next
      default:
        noMatch(op);
    }
    this.program.next();
  }
  private compute(
    tag: BinaryTag,
    lhs: number,
    rhs: number,
    ip: number,
    op: Operation
  ): number {
    switch (tag) {
      case "add":
        return int32(lhs + rhs);
      case "sub":
        return int32(lhs - rhs);
      case "mul":
        return Math.imul(lhs, rhs);
      case "div":
        if (rhs === 0) throw new ArithmeticFault("division by zero", ip, op);
        return truncatingDiv(lhs, rhs);
      case "mod":
        if (rhs === 0) throw new ArithmeticFault("remainder by zero", ip, op);
        return int32(lhs % rhs);
      case "cmpEq":
        return Number(lhs === rhs);
      case "cmpLt":
        return Number(lhs < rhs);
      case "cmpLte":
        return Number(lhs <= rhs);
      case "cmpGt":
        return Number(lhs > rhs);
      case "cmpGte":
        return Number(lhs >= rhs);
      // istanbul ignore next
      default:
        return noMatch(tag);
    }
  }
  private resolve(label: Label, ip: number, op: Operation): number {
    const target = this.labels.get(labelKey(label));
    if (target === undefined) {
      throw new LabelResolutionFault(
        `unresolved label ${formatLabel(label)}`,
        ip,
        op
      );
    }
    return target;
  }
  private frameOf(reg: Register): Frame {
    return reg.tag === "global"
      ? this.frames[0]
      : this.frames[this.frames.length - 1];
  }
  private get(reg: Register): number {
    return this.readRegister(reg);
  }
  private set(reg: Register, value: number): void {
    // Int32Array stores wrap to 32 bits
    this.frameOf(reg).registers[reg.index] = value;
  }
}
