import { disassemble, formatLabel, formatOperation } from "./disassembler";
import { arp_, global_, named_, numbered_ } from "./ir";
import { Writer } from "./writer";

it("formats labels", () => {
  expect(formatLabel(named_("main"))).toBe("main");
  expect(formatLabel(numbered_(3))).toBe("L3");
});

it("formats each kind of operation", () => {
  const ops = new Writer()
    .call(named_("f"))
    .return()
    .push(arp_(1))
    .pushI(-5)
    .immediate("mulI", global_(0), 3, global_(1))
    .binary("mod", global_(0), arp_(2), global_(3))
    .i2i(arp_(0), global_(2))
    .condBranch(global_(4), numbered_(0), numbered_(1))
    .compile().instructions;
  expect(ops.map(formatOperation)).toEqual([
    "call f",
    "return",
    "push rarp+1",
    "pushI -5",
    "mulI r0, 3 => r1",
    "mod r0, rarp+2 => r3",
    "i2i rarp+0 => r2",
    "cbr r4 -> L0, L1",
  ]);
});

it("indents everything but labels", () => {
  const ir = new Writer()
    .label(numbered_(0))
    .loadI(1, global_(0))
    .jumpI(numbered_(0))
    .compile(global_(0));
  expect(disassemble(ir)).toBe(
    ["L0:", "  loadI 1 => r0", "  jumpI -> L0", "; result r0"].join("\n")
  );
  expect(disassemble({ instructions: [], result: null })).toBe("");
});
