export enum EscrowErrorCode {
  /** Caller lacks the seller, creator, joiner or owner role */
  UNAUTHORIZED = "unauthorized",
  /** Operation not permitted from the record's current status */
  INVALID_STATE = "invalid_state",
  /** Operation attempted outside its time window */
  TIMING_VIOLATION = "timing_violation",
  /** Submitted payment differs from the current price */
  AMOUNT_MISMATCH = "amount_mismatch",
  /** Requested state is already the current one */
  ALREADY_IN_STATE = "already_in_state",
  NOT_FOUND = "not_found",
  INVALID_ARGUMENT = "invalid_argument",
  /** A ledger balance or allowance cannot cover a transfer */
  INSUFFICIENT_FUNDS = "insufficient_funds",
}

/**
 * Raised by every failed precondition. The operation that raised it has made
 * no change to stored state or custody.
 */
export class EscrowError extends Error {
  constructor(
    public readonly code: EscrowErrorCode,
    message: string
  ) {
    super(message);
    this.name = "EscrowError";
  }
}

export function isEscrowError(
  err: unknown,
  code?: EscrowErrorCode
): err is EscrowError {
  return err instanceof EscrowError && (code === undefined || err.code === code);
}

/**
 * Throw an EscrowError with `code` unless `condition` holds.
 */
export function ensure(
  condition: boolean,
  code: EscrowErrorCode,
  message: string
): asserts condition {
  if (!condition) {
    throw new EscrowError(code, message);
  }
}
