// istanbul ignore next
export function noMatch(value: never): never {
  throw new Error(`no match: ${JSON.stringify(value)}`);
}

// wraps to a signed 32-bit integer the way two's complement hardware does
export function int32(value: number): number {
  return value | 0;
}

export function truncatingDiv(lhs: number, rhs: number): number {
  return int32(Math.trunc(lhs / rhs));
}
