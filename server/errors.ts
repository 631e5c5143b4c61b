export type TrackerErrorCode =
  | "validation_error"
  | "unknown_user"
  | "no_active_challenge"
  | "storage_error"
  | "invariant_violation";

export class TrackerError extends Error {
  constructor(
    readonly code: TrackerErrorCode,
    readonly status: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TrackerError";
  }
}

/** Rejected input. Raised before anything is written. */
export class ValidationError extends TrackerError {
  constructor(
    message: string,
    readonly field?: string,
  ) {
    super("validation_error", 400, message);
    this.name = "ValidationError";
  }
}

export class UnknownUserError extends TrackerError {
  constructor(readonly userId: string) {
    super("unknown_user", 404, `User ${userId} is not registered`);
    this.name = "UnknownUserError";
  }
}

export class NoActiveChallengeError extends TrackerError {
  constructor(readonly userId: string) {
    super("no_active_challenge", 409, "No active challenge. Set one up first.");
    this.name = "NoActiveChallengeError";
  }
}

export class StorageError extends TrackerError {
  constructor(
    message: string,
    readonly sqlState?: string,
    options?: { cause?: unknown },
  ) {
    super("storage_error", 503, message, options);
    this.name = "StorageError";
  }
}

/** State that should be impossible, e.g. two active challenges for one user */
export class InvariantViolationError extends TrackerError {
  constructor(
    message: string,
    readonly details: Record<string, unknown> = {},
  ) {
    super("invariant_violation", 500, message);
    this.name = "InvariantViolationError";
  }
}

export function errorMessage(err: unknown) {
  if (err instanceof Error) return err.message;
  return String(err);
}
