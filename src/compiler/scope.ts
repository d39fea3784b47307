import { Register } from "../ir";
import { NoParentScopeError, RegisterOverflowError } from "./errors";

/**
 * Register allocation for one function body (or the top level). Indices come
 * from a counter that only grows; nothing is ever freed.
 */
export class Scope {
  private nextIndex = 0;
  private variables: Map<string, Register> = new Map();
  constructor(
    private registerClass: Register["tag"],
    private capacity: number
  ) {}
  allocate(): Register {
    if (this.nextIndex >= this.capacity) {
      throw new RegisterOverflowError(this.capacity);
    }
    return { tag: this.registerClass, index: this.nextIndex++ };
  }
  // unknown names are bound to a fresh register on first use
  variable(name: string): Register {
    const existing = this.variables.get(name);
    if (existing) return existing;
    const reg = this.allocate();
    this.variables.set(name, reg);
    return reg;
  }
}

export class ScopeStack {
  private scopes: Scope[];
  constructor(private capacity: number) {
    this.scopes = [new Scope("global", capacity)];
  }
  current(): Scope {
    return this.scopes[this.scopes.length - 1];
  }
  push(): Scope {
    const scope = new Scope("arp", this.capacity);
    this.scopes.push(scope);
    return scope;
  }
  pop(): void {
    if (this.scopes.length === 1) throw new NoParentScopeError();
    this.scopes.pop();
  }
}
