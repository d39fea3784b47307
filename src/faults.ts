import { formatOperation } from "./disassembler";
import { Operation } from "./ir";

/**
 * A fatal VM condition. The VM does not resume after one; `ip` and `operation`
 * locate the instruction that raised it. `operation` is null for faults about
 * the program as a whole, such as its result register.
 */
export class VMFault extends Error {
  constructor(
    detail: string,
    public readonly ip: number,
    public readonly operation: Operation | null
  ) {
    super(
      operation
        ? `${detail} (at ${ip}: ${formatOperation(operation)})`
        : `${detail} (at ${ip})`
    );
  }
}

export class DuplicateLabelFault extends VMFault {}

export class RegisterBoundsFault extends VMFault {}

export class LabelResolutionFault extends VMFault {}

export class StackUnderflowFault extends VMFault {}

export class FrameStackFault extends VMFault {}

export class ArithmeticFault extends VMFault {}

export class StackOverflowFault extends VMFault {}

export class StepLimitFault extends VMFault {}
