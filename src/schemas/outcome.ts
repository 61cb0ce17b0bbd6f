/**
 * Tagged outcome of a call that may legitimately produce nothing or fail.
 *
 * Retrieval clients never throw for I/O problems; they return one of these and
 * each call site decides what the degraded value is.
 */

export type Outcome<T> =
  | { kind: "success"; value: T }
  | { kind: "empty" }
  | { kind: "failed"; reason: string; error?: unknown };

export function success<T>(value: T): Outcome<T> {
  return { kind: "success", value };
}

export function empty<T>(): Outcome<T> {
  return { kind: "empty" };
}

export function failed<T>(reason: string, error?: unknown): Outcome<T> {
  return error === undefined ? { kind: "failed", reason } : { kind: "failed", reason, error };
}

/** Unwrap a successful outcome, or return `fallback` for empty and failed ones. */
export function valueOr<T>(outcome: Outcome<T>, fallback: T): T {
  return outcome.kind === "success" ? outcome.value : fallback;
}
