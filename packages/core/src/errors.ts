/**
 * packages/core/src/errors.ts — Error taxonomy shared by every Skein package.
 *
 * All deterministic failures (bad arguments, capacity, duplicate handler
 * registration, lookups of absent items) are surfaced as SkeinError instances.
 * Failures raised by user code inside jobs and callbacks keep their original
 * identity.
 */

// =============================================================================
// SkeinErrorCode Union
// =============================================================================

export type SkeinErrorCode =
  | "SKEIN_INVALID_ARGUMENT"
  | "SKEIN_INVALID_STATE"
  | "SKEIN_QUEUE_FULL"
  | "SKEIN_QUEUE_EMPTY"
  | "SKEIN_DUPLICATE_REGISTRATION"
  | "SKEIN_NOT_FOUND"
  | "SKEIN_RESOURCE_CLOSED";

// =============================================================================
// SkeinError Class
// =============================================================================

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class SkeinError extends Error {
  override readonly name = "SkeinError";
  readonly code: SkeinErrorCode;

  constructor(code: SkeinErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SkeinError);
    }
  }
}

export function isSkeinError(err: unknown, code?: SkeinErrorCode): err is SkeinError {
  if (!(err instanceof SkeinError)) return false;
  return code === undefined || err.code === code;
}

export function invalidArgument(detail: string): never {
  throw new SkeinError("SKEIN_INVALID_ARGUMENT", detail);
}

/** Normalizes any thrown value into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
