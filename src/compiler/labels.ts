import { RedefinitionPolicy } from "../config";
import { Label, named_, numbered_ } from "../ir";
import { Writer } from "../writer";
import {
  ArityMismatchError,
  BreakOutsideLoopError,
  DuplicateFunctionError,
  UnknownFunctionError,
} from "./errors";

type FuncRecord = { arity: number; labelIndex: number };
type CallRecord = { name: string; arity: number };

export class LabelState {
  private nextId = 0;
  private loopEnds: Label[] = [];
  private funcs: Map<string, FuncRecord> = new Map();
  private calls: CallRecord[] = [];
  constructor(
    private writer: Writer,
    private policy: RedefinitionPolicy
  ) {}
  create(): Label {
    return numbered_(this.nextId++);
  }
  // writes the entry label for `name`
  func(name: string, arity: number): void {
    const previous = this.funcs.get(name);
    if (previous) {
      if (this.policy === "reject") throw new DuplicateFunctionError(name);
      // the earlier body stays in place but nothing can reach it any more
      this.writer.relabel(previous.labelIndex, this.create());
    }
    this.funcs.set(name, { arity, labelIndex: this.writer.nextIndex() });
    this.writer.label(named_(name));
  }
  call(name: string, arity: number): void {
    this.calls.push({ name, arity });
    this.writer.call(named_(name));
  }
  withLoop<T>(end: Label, fn: () => T): T {
    this.loopEnds.push(end);
    try {
      return fn();
    } finally {
      this.loopEnds.pop();
    }
  }
  breakTarget(): Label {
    const end = this.loopEnds[this.loopEnds.length - 1];
    if (!end) throw new BreakOutsideLoopError();
    return end;
  }
  // call sites may come before the definition they target
  checkCalls(): void {
    for (const { name, arity } of this.calls) {
      const func = this.funcs.get(name);
      if (!func) throw new UnknownFunctionError(name);
      if (func.arity !== arity) {
        throw new ArityMismatchError(name, func.arity, arity);
      }
    }
  }
}
