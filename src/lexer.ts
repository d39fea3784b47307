import moo from "moo";
import { Keyword, Punctuation, Token } from "./token";

// prettier-ignore
export const keywords: ReadonlySet<string> = new Set<Keyword>([
  "fn", "if", "else", "loop", "break", "true", "false",
]);

// longest first: moo tries rules in the order they are declared
// prettier-ignore
const punctuation: Punctuation[] = [
  "==", "<=", ">=", "=", "<", ">",
  "+", "-", "*", "/", "%",
  "(", ")", "{", "}", ",", ";",
];

const lexer = moo.compile({
  whitespace: { match: /[ \t\r\n]+/, lineBreaks: true },
  comment: /\/\/[^\n]*/,
  integer: /0|[1-9][0-9]*/,
  string: /"(?:\\["\\n]|[^\n"\\])*"/,
  identifier: {
    match: /[_a-zA-Z][_a-zA-Z0-9]*/,
    type: (value: string) => (keywords.has(value) ? value : "identifier"),
  },
  ...Object.fromEntries(punctuation.map((op) => [op, op])),
  error: moo.error,
});

export class LexError extends Error {
  constructor(
    public readonly text: string,
    public readonly line: number,
    public readonly col: number
  ) {
    super(`unexpected input ${JSON.stringify(text)} at ${line}:${col}`);
  }
}

function isKeyword(type: string): type is Keyword {
  return keywords.has(type);
}

function isPunctuation(type: string): type is Punctuation {
  return (punctuation as string[]).includes(type);
}

function unescape(quoted: string): string {
  return quoted
    .slice(1, -1)
    .replace(/\\(["\\n])/g, (_, ch: string) => (ch === "n" ? "\n" : ch));
}

function toToken(token: moo.Token): Token | null {
  const type = token.type ?? "error";
  switch (type) {
    case "whitespace":
    case "comment":
      return null;
    case "integer":
      return { tag: "integer", value: Number(token.text) };
    case "string":
      return { tag: "string", value: unescape(token.text) };
    case "identifier":
      return { tag: "identifier", value: token.text };
    default:
      if (isKeyword(type)) return { tag: type };
      if (isPunctuation(type)) return { tag: type };
      // moo.error swallows the rest of the input into a single token
      throw new LexError(token.text.split(/\s/)[0], token.line, token.col);
  }
}

export function lex(source: string): Token[] {
  const tokens: Token[] = [];
  for (const raw of lexer.reset(source)) {
    const token = toToken(raw);
    if (token) tokens.push(token);
  }
  return tokens;
}
