// packages/common/src/errors.ts

export type DonationErrorCode =
  | "INVALID_AMOUNT"
  | "TRANSFER_FAILED"
  | "PROOF_VERIFICATION_FAILED"
  | "TOKEN_NOT_FOUND"
  | "UNAUTHORIZED"
  | "INVALID_ADDRESS"
  | "NO_PRIOR_DONATION"
  | "INVALID_CONFIG";

/**
 * Every failure surfaced to callers of the ledger, registry or orchestrator.
 * `message` is always `"<CODE>: <detail>"` so plain `Error` handlers still see the code.
 */
export class DonationError extends Error {
  readonly code: DonationErrorCode;
  readonly details: Record<string, unknown> | null;

  constructor(
    code: DonationErrorCode,
    detail: string,
    opts?: { cause?: unknown; details?: Record<string, unknown> }
  ) {
    super(`${code}: ${detail}`, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "DonationError";
    this.code = code;
    this.details = opts?.details ?? null;
  }
}

export function isDonationError(e: unknown, code?: DonationErrorCode): e is DonationError {
  if (!(e instanceof DonationError)) return false;
  return code === undefined || e.code === code;
}
