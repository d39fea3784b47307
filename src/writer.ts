import {
  BinaryTag,
  IR,
  ImmediateTag,
  Label,
  Operation,
  Register,
} from "./ir";

export class Writer {
  private instructions: Operation[] = [];
  compile(result: Register | null = null): IR {
    return { instructions: this.instructions, result };
  }
  nextIndex(): number {
    return this.instructions.length;
  }
  write(op: Operation): this {
    this.instructions.push(op);
    return this;
  }
  // points an already written label marker at a different label
  relabel(index: number, label: Label): void {
    const op = this.instructions[index];
    // istanbul ignore next
    if (op?.tag !== "label") throw new Error(`no label at ${index}`);
    this.instructions[index] = { tag: "label", label };
  }
  label(label: Label): this {
    return this.write({ tag: "label", label });
  }
  call(label: Label): this {
    return this.write({ tag: "call", label });
  }
  return(): this {
    return this.write({ tag: "return" });
  }
  push(reg: Register): this {
    return this.write({ tag: "push", reg });
  }
  pushI(value: number): this {
    return this.write({ tag: "pushI", value });
  }
  pop(reg: Register): this {
    return this.write({ tag: "pop", reg });
  }
  binary(tag: BinaryTag, lhs: Register, rhs: Register, out: Register): this {
    return this.write({ tag, lhs, rhs, out });
  }
  immediate(tag: ImmediateTag, lhs: Register, rhs: number, out: Register): this {
    return this.write({ tag, lhs, rhs, out });
  }
  loadI(val: number, out: Register): this {
    return this.write({ tag: "loadI", val, out });
  }
  i2i(lhs: Register, rhs: Register): this {
    return this.write({ tag: "i2i", lhs, rhs });
  }
  jumpI(label: Label): this {
    return this.write({ tag: "jumpI", label });
  }
  condBranch(cond: Register, labelTrue: Label, labelFalse: Label): this {
    return this.write({ tag: "condBranch", cond, labelTrue, labelFalse });
  }
}
