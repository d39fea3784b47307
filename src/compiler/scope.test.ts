import { arp_, global_ } from "../ir";
import { NoParentScopeError, RegisterOverflowError } from "./errors";
import { Scope, ScopeStack } from "./scope";

it("allocates registers in order", () => {
  const scope = new Scope("global", 8);
  expect(scope.allocate()).toEqual(global_(0));
  expect(scope.allocate()).toEqual(global_(1));
});

it("binds a variable once", () => {
  const scope = new Scope("arp", 8);
  expect(scope.variable("x")).toEqual(arp_(0));
  scope.allocate();
  expect(scope.variable("x")).toEqual(arp_(0));
  expect(scope.variable("y")).toEqual(arp_(2));
});

it("stops at its capacity", () => {
  const scope = new Scope("global", 1);
  scope.allocate();
  expect(() => scope.allocate()).toThrow(RegisterOverflowError);
  expect(() => scope.variable("x")).toThrow("scope needs more than 1 registers");
});

it("stacks function scopes over the global scope", () => {
  const scopes = new ScopeStack(4);
  scopes.current().variable("x");

  const inner = scopes.push();
  expect(scopes.current()).toBe(inner);
  expect(inner.variable("x")).toEqual(arp_(0));

  scopes.pop();
  expect(scopes.current().variable("x")).toEqual(global_(0));
  expect(() => scopes.pop()).toThrow(NoParentScopeError);
});
