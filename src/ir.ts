export type Register =
  | { tag: "global"; index: number }
  | { tag: "arp"; index: number };

export type Label =
  | { tag: "named"; name: string }
  | { tag: "numbered"; id: number };

export type ArithmeticTag = "add" | "sub" | "mul" | "div" | "mod";
export type ComparisonTag = "cmpEq" | "cmpLt" | "cmpLte" | "cmpGt" | "cmpGte";
export type ImmediateTag = "addI" | "subI" | "mulI" | "divI";
export type BinaryTag = ArithmeticTag | ComparisonTag;

export type Operation =
  | { tag: "label"; label: Label }
  | { tag: "call"; label: Label }
  | { tag: "return" }
  | { tag: "push"; reg: Register }
  | { tag: "pop"; reg: Register }
  | { tag: "pushI"; value: number }
  | { tag: BinaryTag; lhs: Register; rhs: Register; out: Register }
  | { tag: ImmediateTag; lhs: Register; rhs: number; out: Register }
  | { tag: "loadI"; val: number; out: Register }
  // copies lhs into rhs
  | { tag: "i2i"; lhs: Register; rhs: Register }
  | { tag: "jumpI"; label: Label }
  | { tag: "condBranch"; cond: Register; labelTrue: Label; labelFalse: Label };

export type IR = {
  instructions: Operation[];
  // holds the value of the last top-level expression, if there was one
  result: Register | null;
};

export function global_(index: number): Register {
  return { tag: "global", index };
}

export function arp_(index: number): Register {
  return { tag: "arp", index };
}

export function named_(name: string): Label {
  return { tag: "named", name };
}

export function numbered_(id: number): Label {
  return { tag: "numbered", id };
}

/** Map key for a label, distinct across label classes. */
export function labelKey(label: Label): string {
  return label.tag === "named"
    ? `named:${label.name}`
    : `numbered:${label.id}`;
}

export function registersOf(op: Operation): Register[] {
  switch (op.tag) {
    case "push":
    case "pop":
      return [op.reg];
    case "loadI":
      return [op.out];
    case "i2i":
      return [op.lhs, op.rhs];
    case "condBranch":
      return [op.cond];
    case "label":
    case "call":
    case "return":
    case "pushI":
    case "jumpI":
      return [];
    default:
      return isImmediate(op) ? [op.lhs, op.out] : [op.lhs, op.rhs, op.out];
  }
}

export function isImmediate(
  op: Operation
): op is Extract<Operation, { tag: ImmediateTag }> {
  return (
    op.tag === "addI" ||
    op.tag === "subI" ||
    op.tag === "mulI" ||
    op.tag === "divI"
  );
}
