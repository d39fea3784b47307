import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { UsageError, execute, main, parseArgs } from "./cli";

describe("parseArgs", () => {
  it("reads the command and file", () => {
    expect(parseArgs(["run", "prog.fe"])).toEqual({
      command: "run",
      file: "prog.fe",
      trace: false,
      config: {},
    });
  });
  it("reads options", () => {
    const args = [
      "ir",
      "prog.fe",
      "--unchecked-calls",
      "--reject-redefinition",
      "--max-depth",
      "5",
      "--max-steps",
      "100",
      "--trace",
    ];
    expect(parseArgs(args)).toEqual({
      command: "ir",
      file: "prog.fe",
      trace: true,
      config: {
        checkCalls: false,
        redefinition: "reject",
        maxCallDepth: 5,
        maxSteps: 100,
      },
    });
  });
  it("rejects bad usage", () => {
    expect(() => parseArgs([])).toThrow("unknown command: (none)");
    expect(() => parseArgs(["build", "prog.fe"])).toThrow(UsageError);
    expect(() => parseArgs(["run"])).toThrow("missing input file");
    expect(() => parseArgs(["run", "f", "--max-depth", "0"])).toThrow(
      "--max-depth expects a positive integer"
    );
    expect(() => parseArgs(["run", "f", "--max-steps"])).toThrow(
      "--max-steps expects a positive integer"
    );
    expect(() => parseArgs(["run", "f", "--verbose"])).toThrow(
      "unknown option: --verbose"
    );
  });
});

describe("execute", () => {
  const noLog = () => undefined;
  it("prints the listing", () => {
    expect(execute(parseArgs(["ir", "f"]), "4 + 1;", noLog)).toBe(
      "  loadI 4 => r0\n  loadI 1 => r1\n  add r0, r1 => r2\n; result r2"
    );
  });
  it("prints the result", () => {
    expect(execute(parseArgs(["run", "f"]), "2 * 21;", noLog)).toBe("42");
    expect(execute(parseArgs(["run", "f"]), "", noLog)).toBeNull();
  });
  it("traces only when asked", () => {
    const lines: string[] = [];
    const log = (line: string) => {
      lines.push(line);
    };
    execute(parseArgs(["run", "f"]), "1;", log);
    expect(lines).toEqual([]);
    execute(parseArgs(["run", "f", "--trace"]), "1;", log);
    expect(lines).toEqual(["0 loadI 1 => r0"]);
  });
});

describe("main", () => {
  let dir: string;
  let log: jest.SpyInstance;
  let error: jest.SpyInstance;
  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "ferret-"));
    log = jest.spyOn(console, "log").mockImplementation(() => undefined);
    error = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });
  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("runs a file", () => {
    const file = path.join(dir, "square.fe");
    fs.writeFileSync(file, "fn sq(a) { a * a; } sq(7);");
    expect(main(["run", file])).toBe(0);
    expect(log).toHaveBeenCalledWith("49");
  });
  it("exits with 1 when the program fails", () => {
    const file = path.join(dir, "broken.fe");
    fs.writeFileSync(file, "1 / 0;");
    expect(main(["run", file])).toBe(1);
    expect(error).toHaveBeenCalledWith(
      "run failed:",
      "division by zero (at 2: div r0, r1 => r2)"
    );
    expect(main(["ir", path.join(dir, "missing.fe")])).toBe(1);
  });
  it("exits with 2 on bad usage", () => {
    expect(main(["compile"])).toBe(2);
    expect(error).toHaveBeenCalledWith("unknown command: compile");
    expect(log).not.toHaveBeenCalled();
  });
});
