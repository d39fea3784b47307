export type Operator =
  | "add"
  | "sub"
  | "mul"
  | "div"
  | "mod"
  | "eq"
  | "lt"
  | "lte"
  | "gt"
  | "gte";

/**
 * Binding strength of each operator. Lower values bind more loosely and end up
 * higher in the tree; every level associates to the left.
 */
export const precedence: Record<Operator, number> = {
  eq: 0,
  lt: 0,
  lte: 0,
  gt: 0,
  gte: 0,
  add: 1,
  sub: 1,
  mod: 1,
  mul: 2,
  div: 2,
};

export type Program = { statements: Stmt[] };

export type Stmt =
  | { tag: "fnDef"; name: string; parameters: string[]; block: Block }
  | { tag: "line"; line: BlockLine };

export type Block = BlockLine[];

export type BlockLine =
  | { tag: "expr"; expr: Expr }
  | { tag: "loop"; block: Block }
  | { tag: "break" };

export type Expr =
  | { tag: "int"; value: number }
  | { tag: "str"; value: string }
  | { tag: "boolean"; value: boolean }
  | { tag: "name"; value: string }
  | { tag: "assignment"; varname: string; expr: Expr }
  | { tag: "binOp"; lhs: Expr; operator: Operator; rhs: Expr }
  | { tag: "fnCall"; name: string; args: Expr[] }
  | { tag: "if"; cond: Expr; trueBlock: Block; falseBlock: Block | null };

// literal shorthands: numbers are ints, strings are names
type ExprLiteral = number | string | boolean | Expr;
type LineLiteral = ExprLiteral | BlockLine;

export function expr_(value: ExprLiteral): Expr {
  switch (typeof value) {
    case "number":
      return { tag: "int", value };
    case "string":
      return { tag: "name", value };
    case "boolean":
      return { tag: "boolean", value };
    default:
      return value;
  }
}

function line_(value: LineLiteral): BlockLine {
  if (typeof value !== "object") return { tag: "expr", expr: expr_(value) };
  switch (value.tag) {
    case "expr":
    case "loop":
    case "break":
      return value;
    default:
      return { tag: "expr", expr: value };
  }
}

export function str_(value: string): Expr {
  return { tag: "str", value };
}

export function assign_(varname: string, value: ExprLiteral): Expr {
  return { tag: "assignment", varname, expr: expr_(value) };
}

export function binOp_(
  lhs: ExprLiteral,
  operator: Operator,
  rhs: ExprLiteral
): Expr {
  return { tag: "binOp", lhs: expr_(lhs), operator, rhs: expr_(rhs) };
}

export function call_(name: string, args: ExprLiteral[]): Expr {
  return { tag: "fnCall", name, args: args.map(expr_) };
}

export function if_(
  cond: ExprLiteral,
  trueBlock: LineLiteral[],
  falseBlock: LineLiteral[] | null = null
): Expr {
  return {
    tag: "if",
    cond: expr_(cond),
    trueBlock: trueBlock.map(line_),
    falseBlock: falseBlock ? falseBlock.map(line_) : null,
  };
}

export function loop_(block: LineLiteral[]): BlockLine {
  return { tag: "loop", block: block.map(line_) };
}

export const break_: BlockLine = { tag: "break" };

export function fn_(
  name: string,
  parameters: string[],
  block: LineLiteral[]
): Stmt {
  return { tag: "fnDef", name, parameters, block: block.map(line_) };
}

export function program_(statements: Array<LineLiteral | Stmt>): Program {
  return {
    statements: statements.map((stmt): Stmt =>
      typeof stmt === "object" && (stmt.tag === "fnDef" || stmt.tag === "line")
        ? stmt
        : { tag: "line", line: line_(stmt) }
    ),
  };
}
