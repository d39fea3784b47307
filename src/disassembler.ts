import { IR, Label, Operation, Register } from "./ir";
import { noMatch } from "./utils";

export function formatRegister(reg: Register): string {
  return reg.tag === "global" ? `r${reg.index}` : `rarp+${reg.index}`;
}

export function formatLabel(label: Label): string {
  return label.tag === "named" ? label.name : `L${label.id}`;
}

export function formatOperation(op: Operation): string {
  switch (op.tag) {
    case "label":
      return `${formatLabel(op.label)}:`;
    case "call":
      return `call ${formatLabel(op.label)}`;
    case "return":
      return "return";
    case "push":
    case "pop":
      return `${op.tag} ${formatRegister(op.reg)}`;
    case "pushI":
      return `pushI ${op.value}`;
    case "loadI":
      return `loadI ${op.val} => ${formatRegister(op.out)}`;
    case "i2i":
      return `i2i ${formatRegister(op.lhs)} => ${formatRegister(op.rhs)}`;
    case "jumpI":
      return `jumpI -> ${formatLabel(op.label)}`;
    case "condBranch":
      return `cbr ${formatRegister(op.cond)} -> ${formatLabel(
        op.labelTrue
      )}, ${formatLabel(op.labelFalse)}`;
    case "addI":
    case "subI":
    case "mulI":
    case "divI":
      return `${op.tag} ${formatRegister(op.lhs)}, ${op.rhs} => ${formatRegister(
        op.out
      )}`;
    case "add":
    case "sub":
    case "mul":
    case "div":
    case "mod":
    case "cmpEq":
    case "cmpLt":
    case "cmpLte":
    case "cmpGt":
    case "cmpGte":
      return `${op.tag} ${formatRegister(op.lhs)}, ${formatRegister(
        op.rhs
      )} => ${formatRegister(op.out)}`;
    // istanbul ignore next
    default:
      return noMatch(op);
  }
}

export function disassemble(ir: IR): string {
  const lines = ir.instructions.map((op) =>
    op.tag === "label" ? formatOperation(op) : `  ${formatOperation(op)}`
  );
  if (ir.result) lines.push(`; result ${formatRegister(ir.result)}`);
  return lines.join("\n");
}
