import {
  Block,
  BlockLine,
  Expr,
  Operator,
  Program,
  Stmt,
  precedence,
} from "./ast";
import { Token } from "./token";

interface IParseState {
  token(): Token;
  peek(offset: number): Token;
  advance(): void;
}

type Parser<T> = (state: IParseState) => T;

const endOfInput: Token = { tag: "endOfInput" };
class ParseState implements IParseState {
  private index = 0;
  constructor(private tokens: Token[]) {}
  token(): Token {
    return this.peek(0);
  }
  peek(offset: number): Token {
    return this.tokens[this.index + offset] ?? endOfInput;
  }
  advance(): void {
    this.index++;
  }
}

export class ParseError extends Error {
  constructor(expected: string, received: Token) {
    super(`expected ${expected}, received ${describe(received)}`);
  }
}

function describe(token: Token): string {
  switch (token.tag) {
    case "integer":
      return String(token.value);
    case "string":
      return JSON.stringify(token.value);
    case "identifier":
      return token.value;
    default:
      return token.tag;
  }
}

export function parse(input: Token[]): Program {
  return matchProgram(new ParseState(input));
}

const matchProgram: Parser<Program> = (state) => {
  return { statements: parseUntil(state, matchStatement, checkEndOfInput) };
};

const matchStatement: Parser<Stmt> = (state) => {
  if (!check(state, "fn")) {
    return { tag: "line", line: matchLine(state) };
  }
  const name = match(state, "identifier").value;
  match(state, "(");
  const parameters = commaList(state, checkParameter);
  match(state, ")");
  const block = matchBlock(state);
  return { tag: "fnDef", name, parameters, block };
};

const matchLine: Parser<BlockLine> = (state) => {
  switch (state.token().tag) {
    case "loop": {
      state.advance();
      const block = matchBlock(state);
      check(state, ";");
      return { tag: "loop", block };
    }
    case "break":
      state.advance();
      match(state, ";");
      return { tag: "break" };
    case "if": {
      const expr = matchExpr(state);
      // a bare conditional ends with its block, so `;` is optional
      if (!check(state, ";") && expr.tag !== "if") match(state, ";");
      return { tag: "expr", expr };
    }
    default: {
      const expr = matchExpr(state);
      match(state, ";");
      return { tag: "expr", expr };
    }
  }
};

const matchBlock: Parser<Block> = (state) => {
  match(state, "{");
  return parseUntil(state, matchLine, checkEndBrace);
};

const matchExpr: Parser<Expr> = (state) => {
  return assert(state, "expression", checkExpr(state));
};

const checkExpr: Parser<Expr | null> = (state) => {
  const token = state.token();
  if (token.tag === "identifier" && state.peek(1).tag === "=") {
    state.advance();
    state.advance();
    const expr = matchExpr(state);
    return { tag: "assignment", varname: token.value, expr };
  }
  return checkBinary(state);
};

const operators: Partial<Record<Token["tag"], Operator>> = {
  "+": "add",
  "-": "sub",
  "*": "mul",
  "/": "div",
  "%": "mod",
  "==": "eq",
  "<": "lt",
  "<=": "lte",
  ">": "gt",
  ">=": "gte",
};

const levels = Array.from(new Set(Object.values(precedence))).sort(
  (a, b) => a - b
);

const checkBinary: Parser<Expr | null> = (state) => {
  return checkLevel(state, 0);
};

function checkLevel(state: IParseState, level: number): Expr | null {
  if (level >= levels.length) return checkPrefixExpr(state);
  return infixLeft(
    state,
    (s) => checkLevel(s, level + 1),
    (operator) => precedence[operator] === levels[level]
  );
}

const INT_MAX = 2 ** 31 - 1;
const INT_MIN = -(2 ** 31);

const checkPrefixExpr: Parser<Expr | null> = (state) => {
  if (!check(state, "-")) return checkBaseExpr(state);
  const literal = check(state, "integer");
  if (literal) {
    return { tag: "int", value: checkIntRange(-literal.value) };
  }
  const expr = assert(state, "expression", checkPrefixExpr(state));
  return {
    tag: "binOp",
    lhs: { tag: "int", value: 0 },
    operator: "sub",
    rhs: expr,
  };
};

function checkIntRange(value: number): number {
  if (value > INT_MAX || value < INT_MIN) {
    throw new ParseError("32-bit integer", { tag: "integer", value });
  }
  return value === 0 ? 0 : value;
}

const checkBaseExpr: Parser<Expr | null> = (state) => {
  const token = state.token();
  switch (token.tag) {
    case "(": {
      state.advance();
      const expr = matchExpr(state);
      match(state, ")");
      return expr;
    }
    case "integer":
      state.advance();
      return { tag: "int", value: checkIntRange(token.value) };
    case "string":
      state.advance();
      return { tag: "str", value: token.value };
    case "true":
    case "false":
      state.advance();
      return { tag: "boolean", value: token.tag === "true" };
    case "identifier":
      state.advance();
      if (check(state, "(")) {
        const args = commaList(state, checkExpr);
        match(state, ")");
        return { tag: "fnCall", name: token.value, args };
      }
      return { tag: "name", value: token.value };
    case "if":
      state.advance();
      return matchIf(state);
    default:
      return null;
  }
};

const matchIf: Parser<Expr> = (state) => {
  match(state, "(");
  const cond = matchExpr(state);
  match(state, ")");
  const trueBlock = matchBlock(state);
  if (!check(state, "else")) {
    return { tag: "if", cond, trueBlock, falseBlock: null };
  }
  if (check(state, "if")) {
    const nested = matchIf(state);
    const falseBlock: Block = [{ tag: "expr", expr: nested }];
    return { tag: "if", cond, trueBlock, falseBlock };
  }
  return { tag: "if", cond, trueBlock, falseBlock: matchBlock(state) };
};

const checkParameter: Parser<string | null> = (state) => {
  const param = check(state, "identifier");
  return param ? param.value : null;
};

const checkEndOfInput: Parser<boolean> = (state) => {
  return !!check(state, "endOfInput");
};

// utilities

function check<Tag extends Token["tag"]>(
  state: IParseState,
  tag: Tag
): (Token & { tag: Tag }) | null {
  const token = state.token();
  if (token.tag === tag) {
    state.advance();
    return token as Token & { tag: Tag };
  } else {
    return null;
  }
}

function match<Tag extends Token["tag"]>(
  state: IParseState,
  tag: Tag
): Token & { tag: Tag } {
  const token = state.token();
  if (token.tag === tag) {
    state.advance();
    return token as Token & { tag: Tag };
  } else {
    throw new ParseError(tag, token);
  }
}

function checkEndBrace(state: IParseState): boolean {
  return !!check(state, "}");
}

function parseUntil<T>(
  state: IParseState,
  parseValue: Parser<T>,
  parseEnd: Parser<boolean>
): T[] {
  const out: T[] = [];
  while (!parseEnd(state)) {
    out.push(parseValue(state));
  }
  return out;
}

function infixLeft(
  state: IParseState,
  nextParser: Parser<Expr | null>,
  accepts: (operator: Operator) => boolean
): Expr | null {
  const first = nextParser(state);
  if (!first) return null;
  let left: Expr = first;
  while (true) {
    const operator = operators[state.token().tag];
    if (!operator || !accepts(operator)) {
      break;
    }
    state.advance();
    const right = assert(state, "expression", nextParser(state));
    left = { tag: "binOp", lhs: left, operator, rhs: right };
  }
  return left;
}

function commaList<T>(state: IParseState, checkParser: Parser<T | null>): T[] {
  const out: T[] = [];
  while (true) {
    const res = checkParser(state);
    if (res === null) break;
    out.push(res);
    if (!check(state, ",")) break;
  }
  return out;
}

function assert<T>(state: IParseState, type: string, res: T | null): T {
  if (res === null) {
    throw new ParseError(type, state.token());
  }
  return res;
}
