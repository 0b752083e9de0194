/**
 * Exhaustiveness guard for `switch` over discriminated unions.
 * Adding a union member without handling it becomes a compile error.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(x)}`);
}
