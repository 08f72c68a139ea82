/**
 * Result Envelope
 *
 * Every ledger operation returns either a success carrying its value
 * or a failure carrying a machine-checkable error kind and a
 * human-readable message.
 *
 * Only recoverable domain failures travel in a Failure. Storage
 * faults are thrown, never wrapped.
 */

// =============================================================================
// Error Kinds
// =============================================================================

/**
 * Known ledger error kinds.
 *
 * - InvalidInput: malformed date, period, name, category or identifier
 * - InvalidAmount: malformed or out-of-range amount
 * - InvalidPosting: same-account posting or disallowed category combination
 * - NotFound: unknown account or transaction
 * - PeriodLocked: mutation inside a locked month
 * - DuplicateAccount: (name, category) already present
 * - InvalidField: unknown key in a modify call
 */
export type ErrorKind =
  | "InvalidInput"
  | "InvalidAmount"
  | "InvalidPosting"
  | "NotFound"
  | "PeriodLocked"
  | "DuplicateAccount"
  | "InvalidField";

export interface ErrorDetail {
  readonly kind: ErrorKind;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>> | undefined;
}

// =============================================================================
// Envelope
// =============================================================================

export interface Success<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Failure {
  readonly ok: false;
  readonly error: ErrorDetail;
}

export type Result<T> = Success<T> | Failure;

// =============================================================================
// Factories
// =============================================================================

export function success<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function failure(
  kind: ErrorKind,
  message: string,
  details?: Readonly<Record<string, unknown>>,
): Failure {
  if (details !== undefined) {
    return { ok: false, error: { kind, message, details } };
  }
  return { ok: false, error: { kind, message } };
}
