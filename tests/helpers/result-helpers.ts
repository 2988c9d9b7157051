/**
 * Test Helpers for Result Types
 *
 * These helpers unwrap Results in tests, throwing descriptive errors on failure.
 * This makes test assertions cleaner and failures easier to debug.
 */

import type { Result } from 'neverthrow';

/**
 * Unwrap Ok value from Result, throw if Err.
 *
 * @example
 * const previous = expectOk(router.handleSignal('SIGSEGV'), 'installing SIGSEGV');
 * expect(previous.kind).toBe('default');
 */
export function expectOk<T, E>(result: Result<T, E>, context: string): T {
  if (result.isErr()) {
    throw new Error(`Expected Ok in ${context}, but got Err:\n${describe(result.error)}`);
  }
  return result.value;
}

/**
 * Unwrap Err value from Result, throw if Ok.
 *
 * @example
 * const error = expectErr(router.handleSignal('SIGTERM'), 'installing SIGTERM');
 * expect(error._tag).toBe('Unknown');
 */
export function expectErr<T, E>(result: Result<T, E>, context: string): E {
  if (result.isOk()) {
    throw new Error(`Expected Err in ${context}, but got Ok:\n${describe(result.value)}`);
  }
  return result.error;
}

// Listeners and consumers are functions/classes; JSON.stringify would drop them silently.
function describe(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'function' ? `[function ${v.name}]` : v), 2);
  } catch {
    return String(value);
  }
}
