/**
 * Phase outcomes
 * Each pipeline phase reports success, a failure worth retrying,
 * or a failure that ends the phase
 */

import type { AcquisitionError } from "../errors";

export type Outcome<T, E extends AcquisitionError = AcquisitionError> =
  | { status: "ok"; value: T }
  | { status: "retryable"; error: E }
  | { status: "fatal"; error: E };

/**
 * Outcome of a phase that has already consumed its retries
 */
export type Settled<T, E extends AcquisitionError = AcquisitionError> = Exclude<
  Outcome<T, E>,
  { status: "retryable" }
>;

export function ok<T>(value: T): { status: "ok"; value: T } {
  return { status: "ok", value };
}

export function retryable<E extends AcquisitionError>(
  error: E,
): { status: "retryable"; error: E } {
  return { status: "retryable", error };
}

export function fatal<E extends AcquisitionError>(
  error: E,
): { status: "fatal"; error: E } {
  return { status: "fatal", error };
}
