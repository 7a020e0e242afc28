// ============================================================================
// Result - explicit success/failure values for store-facing operations
// ============================================================================

import type { SaverError } from './types';

export type Result<T, E = SaverError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Unwrap a result, substituting `fallback` on failure
 */
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}
