/**
 * Test Helpers for Result Types
 *
 * Unwrap Results in tests, throwing descriptive errors on failure, so a failed
 * expectation shows the unexpected value instead of a type error.
 */

import type { Result } from 'neverthrow';

/**
 * Unwrap Ok value from Result, throw if Err.
 *
 * @example
 * const bytes = expectOk(await pool.draw(8), 'drawing 8 bytes');
 * expect(bytes).toHaveLength(8);
 */
export function expectOk<T, E>(result: Result<T, E>, context: string): T {
  if (result.isErr()) {
    const errorJson = JSON.stringify(result.error, null, 2);
    throw new Error(`Expected Ok in ${context}, but got Err:\n${errorJson}`);
  }
  return result.value;
}

/**
 * Unwrap Err value from Result, throw if Ok.
 *
 * @example
 * const error = expectErr(await tap.choice([]), 'choice on empty list');
 * expect(error._tag).toBe('EmptyInput');
 */
export function expectErr<T, E>(result: Result<T, E>, context: string): E {
  if (result.isOk()) {
    throw new Error(`Expected Err in ${context}, but got Ok:\n${String(result.value)}`);
  }
  return result.error;
}
