import run, {
  ArithmeticFault,
  LabelResolutionFault,
  ParseError,
  StackOverflowFault,
  StepLimitFault,
  UnknownFunctionError,
  UnsupportedExpressionError,
  compile,
  global_,
} from "./index";

it("evaluates to the last expression", () => {
  expect(run("3;")).toBe(3);
  expect(run("a = 5; a;")).toBe(5);
  expect(run("a = 5; a - 3;")).toBe(2);
  expect(run("a = 3; b = 1; b = 9; a = b; a;")).toBe(9);
  expect(run("")).toBeNull();
});

it("reads unassigned names as 0", () => {
  expect(run("x;")).toBe(0);
  expect(run("x = 5; fn f() { x; } f();")).toBe(0);
});

it("calls functions", () => {
  expect(run("fn addfive(x) { x + 5; } x = 1; addfive(x);")).toBe(6);
  expect(
    run("fn pow(a) { a * a; } fn powadd(a, b) { pow(a) + pow(b); } powadd(2, 4);")
  ).toBe(20);
  expect(run("fn half(a) { a / 2; } fn two() { 2; } half(two() * 10);")).toBe(
    10
  );
});

it("passes arguments in declaration order", () => {
  expect(run("fn sub(a, b) { a - b; } sub(10, 3);")).toBe(7);
});

it("chooses a branch", () => {
  expect(run("if (1 < 2) { 3; } else { 4; }")).toBe(3);
  expect(run("if (2 < 1) { 3; } else { 4; }")).toBe(4);
  expect(run("if (3 == 2) { 3; }")).toBe(0);
  expect(run("if (true) { 1; } else { 2; }")).toBe(1);
  expect(run("if (2) { 1; } else { 5; }")).toBe(5);
  expect(run("a = 7; if (a < 5) { 1; } else if (a < 10) { 2; } else { 3; }")).toBe(
    2
  );
});

it("recurses", () => {
  const fib =
    "fn fib(a, b, n) { if (n == 0) { b; } else { fib(b, a + b, n - 1); } }";
  expect(run(`${fib} fib(1, 1, 10);`)).toBe(144);
  expect(run(`${fib} fib(1, 1, 0);`)).toBe(1);
});

it("loops until a break", () => {
  expect(run("i = 0; loop { i = i + 1; if (i == 10) { break; } } i;")).toBe(10);
  expect(
    run("a = 1; loop { if (a >= 10) { break; } a = a + 1; } a;")
  ).toBe(10);
});

it.each([
  ["+", 17, 5, 22],
  ["-", 17, 5, 12],
  ["*", 17, 5, 85],
  ["/", 17, 5, 3],
  ["%", 17, 5, 2],
  ["-", -3, 9, -12],
])("evaluates %s", (op, a, b, expected) => {
  expect(run(`${a} ${op} ${b};`)).toBe(expected);
});

it("computes with 32-bit integers", () => {
  expect(run("7 + 5 % 3;")).toBe(0);
  expect(run("x = 4; -x + 10;")).toBe(6);
  expect(run("-7 / 2;")).toBe(-3);
  expect(run("-7 % 2;")).toBe(-1);
  expect(run("2147483647 + 1;")).toBe(-2147483648);
});

it("resolves every call to the last definition", () => {
  expect(run("fn f() { 1; } fn f() { 2; } f();")).toBe(2);
  expect(run("fn f() { 1; } a = f(); fn f() { 2; } a + f();")).toBe(4);
});

it("returns the compiled program", () => {
  expect(compile("1;")).toEqual({
    instructions: [{ tag: "loadI", val: 1, out: global_(0) }],
    result: global_(0),
  });
});

it("passes trace and limits to the VM", () => {
  const lines: string[] = [];
  expect(run("1;", { trace: (line) => lines.push(line) })).toBe(1);
  expect(lines).toEqual(["0 loadI 1 => r0"]);
  expect(() => run("fn f(a) { f(a); } f(1);", { maxCallDepth: 50 })).toThrow(
    StackOverflowFault
  );
  expect(() => run("loop { 1; }", { maxSteps: 100 })).toThrow(StepLimitFault);
});

it("reports failures from every stage", () => {
  expect(() => run("1 +;")).toThrow(ParseError);
  expect(() => run('"hi";')).toThrow(UnsupportedExpressionError);
  expect(() => run("f();")).toThrow(UnknownFunctionError);
  expect(() => run("f();", { checkCalls: false })).toThrow(LabelResolutionFault);
  expect(() => run("1 / 0;")).toThrow(ArithmeticFault);
});
