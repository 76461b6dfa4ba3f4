export type AuditErrorCode =
  /** Input file missing or unreadable. Propagated to the caller. */
  | "IO_ERROR"
  /** Password file with fewer than two usable lines. */
  | "INSUFFICIENT_DATA"
  /** Locale catalog missing or unreadable; risk evaluation degrades. */
  | "LOCALIZATION_UNAVAILABLE"
  /** Hash file holds fewer records than there are cracked passwords. */
  | "HASH_COUNT_MISMATCH";

export class AuditError extends Error {
  readonly code: AuditErrorCode;
  readonly details?: Record<string, unknown>;
  override readonly cause?: Error;

  constructor(
    code: AuditErrorCode,
    message: string,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = "AuditError";
    this.code = code;
    this.details = details;
    this.cause = cause;
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      cause: this.cause?.message,
    };
  }
}

export function isAuditError(value: unknown): value is AuditError {
  return value instanceof AuditError;
}

/** Wrap a filesystem failure for `path` as an IO_ERROR. */
export function ioError(path: string, error: unknown): AuditError {
  if (error instanceof AuditError) {
    return error;
  }
  const cause = error instanceof Error ? error : undefined;
  const reason = cause ? cause.message : String(error);
  return new AuditError("IO_ERROR", `cannot read ${path}: ${reason}`, { path }, cause);
}
