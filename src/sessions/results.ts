/**
 * Outcome of a session mutation. Expected failures are values, not exceptions.
 */

export type MutationFailureReason =
  | 'capacity'
  | 'completed'
  | 'empty'
  | 'inactive'
  | 'invalid'
  | 'notFound';

export type MutationResult<T> =
  | { ok: false; message: string; reason: MutationFailureReason }
  | { ok: true; value: T };

export function succeed<T>(value: T): MutationResult<T> {
  return { ok: true, value };
}

export function fail<T>(reason: MutationFailureReason, message: string): MutationResult<T> {
  return { message, ok: false, reason };
}
