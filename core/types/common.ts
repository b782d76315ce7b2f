/**
 * Common types shared across services.
 */

/**
 * Result of an operation that reports failure as a value instead of throwing.
 */
export type Result<T, E = Error> =
  | { success: true; value: T }
  | { success: false; error: E };

/**
 * Create a successful result.
 */
export const success = <T, E = Error>(value: T): Result<T, E> => ({
  success: true,
  value
});

/**
 * Create a failed result.
 */
export const failure = <T, E = Error>(error: E): Result<T, E> => ({
  success: false,
  error
});
