/**
 * Exhaustiveness helper for discriminated unions.
 * Reaching it at runtime means a union member was added without a matching `case`.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(x)}`);
}
