/**
 * Result<T, E> Type for Functional Error Handling
 *
 * Used inside the library where a failure is an expected outcome (an
 * unparseable fault body, for instance) rather than something to throw.
 */

import type { NavError } from './errors.js';

// ============================================================================
// Result Type Definition
// ============================================================================

export type Result<T, E = NavError> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

// ============================================================================
// Constructor Functions
// ============================================================================

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ============================================================================
// Type Guards
// ============================================================================

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok === true;
}


// ============================================================================
// Extraction Functions
// ============================================================================

/**
 * Unwraps a Result, returning the value or throwing the error.
 *
 * @throws {E} The error if result is Err
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) {
    return result.value;
  }
  throw result.error;
}

export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  return isOk(result) ? result.value : defaultValue;
}

// ============================================================================
// Transformation Functions
// ============================================================================

export function map<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> {
  return isOk(result) ? ok(fn(result.value)) : result;
}

/**
 * Applies a function to the Ok value and flattens the result.
 */
export function andThen<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> {
  return isOk(result) ? fn(result.value) : result;
}

// ============================================================================
// Interop
// ============================================================================

/**
 * Runs a throwing function and captures the outcome, mapping any thrown value
 * through `mapError`.
 */
export function fromThrowableWith<T, E>(
  fn: () => T,
  mapError: (error: unknown) => E
): Result<T, E> {
  try {
    return ok(fn());
  } catch (error) {
    return err(mapError(error));
  }
}
