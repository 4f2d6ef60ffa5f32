import type { Result } from 'neverthrow';

/**
 * Unwrap a result, throwing its error if it has one.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.isOk()) {
    return result.value;
  }
  throw result.error;
}
