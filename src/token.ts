export type Token =
  | { tag: "fn" }
  | { tag: "if" }
  | { tag: "else" }
  | { tag: "loop" }
  | { tag: "break" }
  | { tag: "true" }
  | { tag: "false" }
  | { tag: "integer"; value: number }
  | { tag: "string"; value: string }
  | { tag: "identifier"; value: string }
  | { tag: "==" }
  | { tag: "<=" }
  | { tag: ">=" }
  | { tag: "=" }
  | { tag: "<" }
  | { tag: ">" }
  | { tag: "+" }
  | { tag: "-" }
  | { tag: "*" }
  | { tag: "/" }
  | { tag: "%" }
  | { tag: "(" }
  | { tag: ")" }
  | { tag: "{" }
  | { tag: "}" }
  | { tag: "," }
  | { tag: ";" }
  | { tag: "endOfInput" };

export type Keyword = "fn" | "if" | "else" | "loop" | "break" | "true" | "false";

export type Punctuation = Exclude<
  Token,
  { value: unknown } | { tag: Keyword } | { tag: "endOfInput" }
>["tag"];
