/**
 * Exhaustiveness guard for discriminated unions (host events, error tags, states).
 * Adding a union member without handling it becomes a compile error at the `switch`.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
