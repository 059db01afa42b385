/**
 * @fileoverview Result type for explicit error handling
 *
 * Rule predicates and file reads report failures as values so one bad input
 * cannot abort a whole analysis run.
 */

import * as fs from 'node:fs/promises';

// ============================================================================
// CORE RESULT TYPE
// ============================================================================

export type OkResult<T> = { readonly ok: true; readonly value: T };
export type ErrResult<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

// ============================================================================
// RESULT HELPERS
// ============================================================================

/**
 * Wrap a sync function in a Result
 */
export function safeSync<T>(fn: () => T): Result<T, Error> {
  try {
    return Ok(fn());
  } catch (e) {
    return Err(toError(e));
  }
}

// ============================================================================
// SAFE FILE OPERATIONS
// ============================================================================

/**
 * Read a UTF-8 file, reporting a missing file as `Ok(null)`.
 */
export async function safeReadOptionalFile(path: string): Promise<Result<string | null, Error>> {
  try {
    return Ok(await fs.readFile(path, 'utf-8'));
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      return Ok(null);
    }
    return Err(toError(e));
  }
}

/**
 * Safe JSON parse
 */
export function safeJsonParse(json: string): Result<unknown, Error> {
  return safeSync((): unknown => JSON.parse(json));
}
