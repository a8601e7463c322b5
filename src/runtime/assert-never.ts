/** Compile-time exhaustiveness check for a `switch` over a tagged union. */
export function assertNever(value: never, context = 'union member'): never {
  throw new Error(`Unhandled ${context}: ${JSON.stringify(value)}`);
}
