import { LexError, lex } from "./lexer";

it("lexes a function definition", () => {
  expect(lex("fn add(a, b) { a + b; }")).toEqual([
    { tag: "fn" },
    { tag: "identifier", value: "add" },
    { tag: "(" },
    { tag: "identifier", value: "a" },
    { tag: "," },
    { tag: "identifier", value: "b" },
    { tag: ")" },
    { tag: "{" },
    { tag: "identifier", value: "a" },
    { tag: "+" },
    { tag: "identifier", value: "b" },
    { tag: ";" },
    { tag: "}" },
  ]);
});

it("prefers the longest operator", () => {
  expect(lex("a == b <= c >= d = e < f > g % h").map((t) => t.tag)).toEqual([
    "identifier",
    "==",
    "identifier",
    "<=",
    "identifier",
    ">=",
    "identifier",
    "=",
    "identifier",
    "<",
    "identifier",
    ">",
    "identifier",
    "%",
    "identifier",
  ]);
});

it("only treats whole words as keywords", () => {
  expect(lex("loop looping iffy true")).toEqual([
    { tag: "loop" },
    { tag: "identifier", value: "looping" },
    { tag: "identifier", value: "iffy" },
    { tag: "true" },
  ]);
});

it("skips comments and whitespace", () => {
  expect(lex("1; // trailing\n\t2;")).toEqual([
    { tag: "integer", value: 1 },
    { tag: ";" },
    { tag: "integer", value: 2 },
    { tag: ";" },
  ]);
});

it("unescapes strings", () => {
  expect(lex('"say \\"hi\\"\\n"')).toEqual([
    { tag: "string", value: 'say "hi"\n' },
  ]);
});

it("lexes an empty source", () => {
  expect(lex("")).toEqual([]);
  expect(lex("  // nothing\n")).toEqual([]);
});

it("reports the position of unexpected input", () => {
  expect(() => lex("a = 1 @ 2;")).toThrow(LexError);
  expect(() => lex("a = 1 @ 2;")).toThrow('unexpected input "@" at 1:7');
  expect(() => lex("a;\nb = $x;")).toThrow('unexpected input "$x;" at 2:5');
});
