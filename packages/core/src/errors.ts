/**
 * packages/core/src/errors.ts: Error codes and the error class for Lattice.
 *
 * Why: Every contract violation in the widget core surfaces with a stable,
 * deterministic code. Recoverable lookups (missing properties) are returned as
 * result values; construction and access defects are thrown as UiError.
 */

/**
 * Deterministic error codes for all widget-core violations.
 *
 *   - UI_PROPERTY_NOT_FOUND: container never declared the requested property key
 *   - UI_ARITY_VIOLATION: child added beyond the template's parent arity
 *   - UI_BORROW_CONFLICT: overlapping exclusive/shared access to one property cell
 *   - UI_INVALID_PROPS: value rejected by a property guard, or invalid config
 *   - UI_INVALID_STATE: operation on a disposed runtime or a released cell
 *   - UI_REENTRANT_CALL: event dispatch started from inside an event callback
 *   - UI_USER_CODE_THROW: a State or event callback threw
 */
export type UiErrorCode =
  | "UI_PROPERTY_NOT_FOUND"
  | "UI_ARITY_VIOLATION"
  | "UI_BORROW_CONFLICT"
  | "UI_INVALID_PROPS"
  | "UI_INVALID_STATE"
  | "UI_REENTRANT_CALL"
  | "UI_USER_CODE_THROW";

/**
 * Error class for all deterministic widget-core violations.
 * The `code` property identifies the specific violation.
 */
export class UiError extends Error {
  override readonly name = "UiError";
  readonly code: UiErrorCode;

  constructor(code: UiErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UiError);
    }
  }
}

/** Non-throwing failure record, as carried by result unions and tick reports. */
export type UiFailure<C extends UiErrorCode = UiErrorCode> = Readonly<{
  code: C;
  detail: string;
}>;

/** Format a thrown value as `Name: message` for diagnostics. */
export function describeThrown(e: unknown): string {
  if (e instanceof Error) return `${e.name}: ${e.message}`;
  return String(e);
}

export function isUiError(e: unknown, code?: UiErrorCode): e is UiError {
  if (!(e instanceof UiError)) return false;
  return code === undefined || e.code === code;
}
